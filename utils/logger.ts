export type Verbosity = 'quiet' | 'normal' | 'debug';

function getVerbosity(): Verbosity {
  const v = String(process.env.LOG_VERBOSITY || 'normal').toLowerCase();
  if (v === 'quiet' || v === 'debug') return v;
  return 'normal';
}

function ts(): string {
  return new Date().toISOString();
}

// warn/error always print; quiet only silences info
export const logger = {
  debug: (...args: unknown[]) => {
    if (getVerbosity() === 'debug') console.debug('[debug]', ts(), ...args);
  },
  info: (...args: unknown[]) => {
    if (getVerbosity() !== 'quiet') console.log('[info]', ts(), ...args);
  },
  warn: (...args: unknown[]) => {
    console.warn('[warn]', ts(), ...args);
  },
  error: (...args: unknown[]) => {
    console.error('[error]', ts(), ...args);
  },
};

export function isDebug(): boolean { return getVerbosity() === 'debug'; }
