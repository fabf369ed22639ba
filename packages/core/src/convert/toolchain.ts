import { ConversionError, describeError } from '../errors';
import { getLogger } from '../logger';
import { runCommand, type CommandResult } from '../utils/process';
import type { ToolchainOptions } from './types';

/**
 * Run an external converter and fail with a ConversionError on a missing
 * binary, a timeout or a non-zero exit. `okCodes` widens the accepted exits.
 */
export async function runTool(
  label: string,
  defaultBinary: string,
  args: string[],
  opts: ToolchainOptions = {},
  okCodes: readonly number[] = [0]
): Promise<CommandResult> {
  const binary = opts.binary ?? defaultBinary;
  const run = opts.runner ?? runCommand;
  const timeoutMs = opts.timeoutMs ?? 120_000;
  const log = (opts.logger ?? getLogger('core')).child({ tool: label });

  log.debug('convert.tool.start', { binary, args: args.length });
  const result = await run(binary, args, { timeoutMs }).catch((err: unknown) => {
    throw new ConversionError(`${label} failed to start: ${describeError(err)}`, { cause: err });
  });
  if (result.timedOut) {
    log.error('convert.tool.timeout', { binary, timeout_ms: timeoutMs });
    throw new ConversionError(`${label} timed out after ${timeoutMs} ms`);
  }
  if (!okCodes.includes(result.exitCode)) {
    log.error('convert.tool.failed', { binary, exit_code: result.exitCode, stderr: result.stderr.slice(0, 500) });
    throw new ConversionError(`${label} failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
  }
  return result;
}
