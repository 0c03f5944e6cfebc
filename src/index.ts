import { ZodError } from "zod";
import { runCli } from "./cli/main";
import { logger } from "./shared/logger/logger";

const describeFailure = (error: unknown) => {
  if (error instanceof ZodError) {
    return {
      kind: "invalid_options",
      issues: error.issues.map(
        (issue) => `${issue.path.join(".") || "options"}: ${issue.message}`,
      ),
    };
  }

  if (error instanceof Error) {
    return { kind: error.name, message: error.message, stack: error.stack };
  }

  return { kind: "unknown", message: String(error) };
};

runCli(process.argv).catch((error: unknown) => {
  logger.error({ error: describeFailure(error) }, "Evaluation run aborted");
  process.exitCode = 1;
});
