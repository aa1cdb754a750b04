import pino from "pino";

export const SCOREBOARD_URL = "https://monkeytype.com/api/scoreboard?user=alice";

export function captureLogger() {
  const lines: string[] = [];
  const logger = pino.pino(
    { level: "info" },
    {
      write: (msg: string) => {
        lines.push(msg);
      },
    },
  );
  return { logger, lines };
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function timeoutError(): Error {
  const error = new Error("The operation was aborted due to timeout");
  error.name = "TimeoutError";
  return error;
}
