import * as dotenv from 'dotenv';

dotenv.config();

function getEnv(key: string, fallback?: string) {
  const v = process.env[key];
  if (v === undefined || v === '') return fallback;
  return v;
}

function getInt(key: string, fallback: number) {
  const n = Number(getEnv(key));
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export type Config = {
  port: number;
  authToken?: string;
  corsOrigin: string;
  historyCapacity: number;
};

export const config: Config = {
  port: getInt('PORT', 3000),
  authToken: getEnv('AUTH_TOKEN'),
  corsOrigin: getEnv('CORS_ORIGIN', '*') ?? '*',
  historyCapacity: getInt('HISTORY_CAPACITY', 1000)
};
