import fs from "fs";
import path from "path";
import * as dotenv from "dotenv";

export enum EnvState {
  PROD = "production",
  DEV = "development",
  TEST = "test",
}

const isEnvState = (value: string | undefined): value is EnvState =>
  value !== undefined && Object.values<string>(EnvState).includes(value);

export const NODE_ENV: EnvState = isEnvState(process.env.NODE_ENV)
  ? process.env.NODE_ENV
  : EnvState.DEV;

export const isProduction = () => NODE_ENV === EnvState.PROD;
export const isTest = () => NODE_ENV === EnvState.TEST;

let _resolvedPath: string | null | undefined;

export function getEnvFileName(): string | null {
  if (_resolvedPath !== undefined) return _resolvedPath;
  const candidate = `.env.${NODE_ENV || "development"}`;
  const full = path.resolve(process.cwd(), candidate);
  _resolvedPath = fs.existsSync(full) ? candidate : null;
  return _resolvedPath;
}

export function loadDotenv(): string | null {
  const envFile = getEnvFileName();
  if (envFile) dotenv.config({ path: envFile });
  else dotenv.config(); // fallback to .env if present
  return envFile;
}
