/**
 * Capture-session command handler: the SessionStart hook entry point.
 */

import { captureSession } from '../../session/capture.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { writeJson } from '../utils/errorHandling.js';

/**
 * Handles `splitplan capture-session`, reading the hook payload from stdin.
 *
 * Always exits 0: an unexpected error is logged and an empty document printed.
 */
export async function handleCaptureSessionCommand(context: CliContext): Promise<CliCommandResult> {
  const log = context.logger.child('SessionCapture');
  try {
    const payload = await context.io.readStdin();
    const result = await captureSession(payload, context.sessionEnv, log);
    writeJson(context.io, result.output ?? {});
  } catch (error) {
    log.error('capture_failed', { error: error instanceof Error ? error.message : String(error) });
    writeJson(context.io, {});
  }
  return { exitCode: 0 };
}
