import type { InstallContext, InstallStep, StepId } from "./installPlan.js";
import { toInstallerError } from "@@/models/errorCodes.js";

export interface InstallSummary {
  completed: StepId[];
  durationMs: number;
  dryRun: boolean;
}

export interface RunInstallOptions {
  now?: () => number;
}

/**
 * Runs the plan strictly in order. The first failing step aborts the run;
 * nothing after it executes and nothing before it is rolled back.
 */
export async function runInstall(
  plan: readonly InstallStep[],
  context: InstallContext,
  options: RunInstallOptions = {}
): Promise<InstallSummary> {
  const now = options.now ?? (() => Date.now());
  const startedAt = now();
  const completed: StepId[] = [];

  for (const [index, step] of plan.entries()) {
    const logger = context.logger.child({ step: step.id });
    const stepStartedAt = now();
    logger.info({ title: step.title, position: index + 1, total: plan.length, privileged: step.privileged }, "step.begin");

    try {
      await step.run({ ...context, logger });
    } catch (error) {
      const failure = toInstallerError(error, { step: step.id });
      logger.error(
        { code: failure.definition.numericCode, reason: failure.definition.reason, details: failure.details },
        "step.failed"
      );
      throw failure;
    }

    completed.push(step.id);
    logger.info({ durationMs: now() - stepStartedAt }, "step.success");
  }

  const summary: InstallSummary = {
    completed,
    durationMs: now() - startedAt,
    dryRun: context.config.dryRun,
  };
  context.logger.info(summary, "install.complete");
  return summary;
}
