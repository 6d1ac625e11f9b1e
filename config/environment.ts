import dotenv from 'dotenv';

let initialized = false;

// ENV=production → .env.production, unset → .env.local; a plain .env fills whatever is left
export function initializeEnvironment(): void {
  if (initialized) return;
  initialized = true;
  const envPath = `.env.${process.env.ENV || 'local'}`;
  dotenv.config({ path: envPath });
  dotenv.config();
}

export function getEnvironmentVariable(name: string, fallback = ''): string {
  const value = process.env[name];
  if (value === undefined || value.trim() === '') return fallback;
  return value.trim();
}
