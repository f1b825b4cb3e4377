import { describeFailure, type FailureDescription } from "../application/failure";
import { runWorker } from "../composition/root";

type CliErrorEnvelope = FailureDescription & {
  event: "worker.failed";
  stack?: string;
};

const DEBUG_FLAGS = new Set(["1", "true"]);

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean =>
  DEBUG_FLAGS.has(env.DEBUG?.trim().toLowerCase() ?? "");

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const envelope: CliErrorEnvelope = { event: "worker.failed", ...describeFailure(err) };
  if (includeStack && err instanceof Error && typeof err.stack === "string") {
    envelope.stack = err.stack;
  }
  return envelope;
};

/**
 * Runs the consumer until SIGINT/SIGTERM. The job in flight finishes first;
 * the loop then exits at its next check.
 */
export const executeWorkerCli = async (): Promise<void> => {
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  try {
    await runWorker(controller.signal);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  } finally {
    process.removeListener("SIGINT", stop);
    process.removeListener("SIGTERM", stop);
  }
};

if (require.main === module) {
  void executeWorkerCli();
}
