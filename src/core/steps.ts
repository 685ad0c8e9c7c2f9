import type { StepName, StepResult } from '../types';
import { type CommandOptions, type CommandResult, formatCommand, type HostRuntime, outputTail } from '../infra/hostRuntime';
import { describeError, ProvisionError, type ProvisionErrorOptions } from './errors';

export type ProvisionErrorClass = new (message: string, options?: ProvisionErrorOptions) => ProvisionError;

export type StepOutcome =
  | { status: 'CREATED'; detail: string }
  | { status: 'ALREADY_PRESENT'; detail: string };

export const created = (detail: string): StepOutcome => ({ status: 'CREATED', detail });
export const alreadyPresent = (detail: string): StepOutcome => ({ status: 'ALREADY_PRESENT', detail });

/**
 * Runs one step body and folds the way it ended into a StepResult.
 * A ProvisionError thrown by the body is the step's failure as-is; anything
 * else is wrapped in the step's own error class.
 */
export async function guardStep(
  step: StepName,
  ErrorClass: ProvisionErrorClass,
  body: () => Promise<StepOutcome> | StepOutcome
): Promise<StepResult> {
  try {
    const outcome = await body();
    return { step, ...outcome };
  } catch (err) {
    const error = err instanceof ProvisionError ? err : new ErrorClass(describeError(err), { cause: err });
    return { step, status: 'FAILED', error };
  }
}

/**
 * Runs a command and throws ErrorClass when it does not exit cleanly.
 */
export async function runChecked(
  host: HostRuntime,
  ErrorClass: ProvisionErrorClass,
  command: string,
  args: readonly string[],
  options?: CommandOptions
): Promise<CommandResult> {
  const result = await host.runCommand(command, args, options);
  if (!result.ok) {
    const status = result.exitCode === null ? '' : ` (exit code ${result.exitCode})`;
    throw new ErrorClass(`\`${formatCommand(command, args)}\` failed${status}: ${result.error ?? 'unknown error'}`, {
      commandExitCode: result.exitCode,
      output: outputTail(result),
    });
  }
  return result;
}
