import { parseArgs } from "node:util";
import { z } from "zod";
import { DEFAULT_OUTPUT_PATH } from "../constants.js";
import { ValidationError } from "../errors/index.js";
import { generateBadge } from "./generate.js";
import { type ScoreboardRequestOptions } from "./monkeytype.js";

export const USAGE =
  "Usage: npx tsx src/scripts/buildBadge.ts --username <name> [--output <path>]";

export const CliArgsSchema = z.object({
  username: z
    .string({ required_error: "--username is required." })
    .min(1, { message: "--username cannot be empty." }),
  output: z
    .string()
    .min(1, { message: "--output cannot be empty." })
    .default(DEFAULT_OUTPUT_PATH),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

export type ParsedCommand = { help: true } | ({ help: false } & CliArgs);

export function parseCliArgs(argv: string[]): ParsedCommand {
  let values: { username?: string; output?: string; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        username: { type: "string" },
        output: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (e) {
    throw new ValidationError({
      message: e instanceof Error ? e.message : String(e),
    });
  }
  if (values.help) {
    return { help: true };
  }
  const result = CliArgsSchema.safeParse({
    username: values.username,
    output: values.output,
  });
  if (!result.success) {
    throw new ValidationError({
      message: result.error.issues.map((issue) => issue.message).join(" "),
    });
  }
  return { help: false, ...result.data };
}

export interface CommandOutput {
  log: (line: string) => void;
  error: (line: string) => void;
}

/**
 * Runs the badge command and returns the process exit code. Filesystem
 * errors from writing the badge are not caught.
 */
export async function runBadgeCommand(
  argv: string[],
  output: CommandOutput = console,
  requestOptions: ScoreboardRequestOptions = {},
): Promise<number> {
  let command: ParsedCommand;
  try {
    command = parseCliArgs(argv);
  } catch (e) {
    if (!(e instanceof ValidationError)) {
      throw e;
    }
    output.error(`Error: ${e.message}`);
    output.error(USAGE);
    return 1;
  }

  if (command.help) {
    output.log(USAGE);
    return 0;
  }
  const { outputPath } = await generateBadge({
    ...requestOptions,
    username: command.username,
    outputPath: command.output,
  });
  output.log(`Wrote badge to ${outputPath}`);
  return 0;
}
