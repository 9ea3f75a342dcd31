export type ExecutionMode = 'LIVE' | 'PAPER';

export function parseExecutionMode(raw: string | undefined): ExecutionMode {
  const mode = (raw || 'PAPER').trim().toUpperCase();

  if (mode !== 'LIVE' && mode !== 'PAPER') {
    throw new Error(`[CONFIG_FATAL] Invalid EXECUTION_MODE="${raw}". Must be "LIVE" or "PAPER".`);
  }

  return mode;
}
