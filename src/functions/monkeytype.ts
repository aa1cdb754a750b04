import config from "../config.js";
import { USERNAME_PLACEHOLDER } from "../constants.js";
import {
  BaseError,
  EmptyPayloadError,
  PayloadDecodeError,
  UpstreamRequestError,
  UpstreamStatusError,
} from "../errors/index.js";
import { getLogger, type Logger } from "../logger.js";
import {
  RunRecordSchema,
  ScoreboardPayloadSchema,
  type RunSamples,
  type ScoreboardPayload,
  type StatsSummary,
} from "../types/stats.js";
import { calculateMax, calculateMean } from "../util.js";
import { coerceNumber, roundHalfEven } from "./utils.js";

export type FetchFn = typeof globalThis.fetch;

export interface ScoreboardRequestOptions {
  urlTemplate?: string;
  timeoutMs?: number;
  userAgent?: string;
  /** Injectable fetch for testing. Defaults to globalThis.fetch. */
  fetchFn?: FetchFn;
  logger?: Logger;
}

function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function isAbort(e: unknown): boolean {
  return e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError");
}

export function buildScoreboardUrl(
  username: string,
  urlTemplate: string = config.MONKEYTYPE_SCOREBOARD_URL,
): string {
  return urlTemplate.split(USERNAME_PLACEHOLDER).join(username);
}

export async function fetchScoreboard(
  username: string,
  {
    urlTemplate = config.MONKEYTYPE_SCOREBOARD_URL,
    timeoutMs = config.MONKEYTYPE_TIMEOUT_MS,
    userAgent = config.MONKEYTYPE_USER_AGENT,
    fetchFn = globalThis.fetch,
  }: ScoreboardRequestOptions = {},
): Promise<ScoreboardPayload> {
  const url = buildScoreboardUrl(username, urlTemplate);
  let response: Response;
  try {
    response = await fetchFn(url, {
      method: "GET",
      headers: { "User-Agent": userAgent },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (e) {
    throw new UpstreamRequestError({
      message: `Request to ${url} failed: ${describeError(e)}`,
      cause: e,
    });
  }

  if (!response.ok) {
    throw new UpstreamStatusError({ status: response.status, url });
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch (e) {
    if (isAbort(e)) {
      throw new UpstreamRequestError({
        message: `Request to ${url} failed: ${describeError(e)}`,
        cause: e,
      });
    }
    throw new PayloadDecodeError({
      message: `Failed to decode JSON from ${url}: ${describeError(e)}`,
      cause: e,
    });
  }

  const parsed = ScoreboardPayloadSchema.safeParse(data);
  if (!parsed.success) {
    throw new EmptyPayloadError({
      message: `Expected a non-empty list of runs from ${url}`,
    });
  }
  return parsed.data;
}

export function extractRunSamples(payload: readonly unknown[]): RunSamples {
  const wpms: number[] = [];
  const accs: number[] = [];
  for (const item of payload) {
    const record = RunRecordSchema.safeParse(item);
    if (!record.success) continue;
    const { wpm, acc } = record.data;
    if (wpm !== undefined) {
      const value = coerceNumber(wpm);
      if (value !== null) wpms.push(value);
    }
    if (acc !== undefined) {
      const value = coerceNumber(acc);
      if (value !== null) accs.push(value);
    }
  }
  return { wpms, accs };
}

export function summarizeRuns({ wpms, accs }: RunSamples): StatsSummary {
  return {
    bestWpm: roundHalfEven(calculateMax(wpms)),
    averageAccuracy: roundHalfEven(calculateMean(accs), 1),
    accuracySamples: accs.length,
  };
}

/**
 * Fetches a user's recent runs and summarizes them. Any upstream failure is
 * logged and reported as `null` ("no data"); it never throws for those.
 */
export async function fetchStats(
  username: string,
  options: ScoreboardRequestOptions = {},
): Promise<StatsSummary | null> {
  const logger = options.logger ?? getLogger("monkeytype");
  try {
    const payload = await fetchScoreboard(username, options);
    const samples = extractRunSamples(payload);
    logger.debug(
      `Found ${samples.wpms.length} speed and ${samples.accs.length} accuracy samples for ${username}.`,
    );
    return summarizeRuns(samples);
  } catch (e) {
    if (e instanceof EmptyPayloadError) {
      logger.warn(e.message);
      return null;
    }
    if (e instanceof BaseError) {
      logger.error({ err: e }, e.message);
      return null;
    }
    throw e;
  }
}
