/**
 * SessionStart hook: hands the host's session id to later setup invocations.
 *
 * The hook never fails: unusable payloads and env file errors are logged and
 * otherwise ignored.
 *
 * @packageDocumentation
 */

import type { SessionEnvironment } from '../config/types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import {
  PathValidationError,
  isErrnoException,
  safeAppendFile,
  safeReadTextFile,
} from '../utils/safe-fs.js';

/**
 * Environment variable carrying the captured session id.
 */
export const SESSION_ID_VAR = 'SPLITPLAN_SESSION_ID';

/**
 * Environment variable carrying the transcript path.
 */
export const TRANSCRIPT_PATH_VAR = 'CLAUDE_TRANSCRIPT_PATH';

/**
 * Hook output surfaced to the host as additional context.
 */
export interface HookOutput {
  readonly hookSpecificOutput: {
    readonly hookEventName: 'SessionStart';
    readonly additionalContext: string;
  };
}

export interface CaptureResult {
  /** Output for the host; null when the id is already in place or missing. */
  readonly output: HookOutput | null;
  /** Lines appended to the env file by this run. */
  readonly envFileLines: readonly string[];
}

interface SessionStartPayload {
  readonly sessionId: string;
  readonly transcriptPath: string | undefined;
}

const NOTHING: CaptureResult = { output: null, envFileLines: [] };

function parsePayload(payloadText: string, log: Logger): SessionStartPayload | null {
  let data: unknown;
  try {
    data = JSON.parse(payloadText);
  } catch (error) {
    log.warn('payload_unparseable', { error: error instanceof Error ? error.message : String(error) });
    return null;
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    log.warn('payload_not_object');
    return null;
  }
  const sessionId: unknown = Reflect.get(data, 'session_id');
  const transcriptPath: unknown = Reflect.get(data, 'transcript_path');
  if (typeof sessionId !== 'string' || sessionId === '') {
    log.debug('payload_without_session_id');
    return null;
  }

  return {
    sessionId,
    transcriptPath: typeof transcriptPath === 'string' && transcriptPath !== '' ? transcriptPath : undefined,
  };
}

async function readEnvFile(envFile: string): Promise<string> {
  try {
    return await safeReadTextFile(envFile);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return '';
    }
    throw error;
  }
}

/**
 * Appends the export lines the env file is missing.
 *
 * @returns The lines written.
 */
async function updateEnvFile(envFile: string, payload: SessionStartPayload): Promise<string[]> {
  const existing = await readEnvFile(envFile);
  const lines: string[] = [];

  if (!existing.includes(`${SESSION_ID_VAR}=${payload.sessionId}`)) {
    lines.push(`export ${SESSION_ID_VAR}=${payload.sessionId}\n`);
  }
  if (
    payload.transcriptPath !== undefined &&
    !existing.includes(`${TRANSCRIPT_PATH_VAR}=${payload.transcriptPath}`)
  ) {
    lines.push(`export ${TRANSCRIPT_PATH_VAR}=${payload.transcriptPath}\n`);
  }

  if (lines.length > 0) {
    await safeAppendFile(envFile, lines.join(''));
  }
  return lines;
}

/**
 * Handles a SessionStart payload.
 *
 * Emits the session id as additional context unless the environment already carries
 * it, and records it in the host's env file when one is configured.
 *
 * @param payloadText - Raw JSON payload from the host.
 */
export async function captureSession(
  payloadText: string,
  sessionEnv: SessionEnvironment,
  log: Logger = defaultLogger.child('SessionCapture')
): Promise<CaptureResult> {
  const payload = parsePayload(payloadText, log);
  if (payload === null) {
    return NOTHING;
  }

  const output: HookOutput | null =
    sessionEnv.capturedSessionId === payload.sessionId
      ? null
      : {
          hookSpecificOutput: {
            hookEventName: 'SessionStart',
            additionalContext: `${SESSION_ID_VAR}=${payload.sessionId}`,
          },
        };

  if (sessionEnv.envFile === undefined) {
    return { output, envFileLines: [] };
  }

  try {
    const envFileLines = await updateEnvFile(sessionEnv.envFile, payload);
    if (envFileLines.length > 0) {
      log.debug('env_file_updated', { envFile: sessionEnv.envFile, lines: envFileLines.length });
    }
    return { output, envFileLines };
  } catch (error) {
    if (isErrnoException(error) || error instanceof PathValidationError) {
      log.warn('env_file_write_failed', { envFile: sessionEnv.envFile, error: error.message });
      return { output, envFileLines: [] };
    }
    throw error;
  }
}
