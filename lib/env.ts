import * as dotenv from "dotenv";
import path from "node:path";

let loaded = false;

/** Load `.env` from the working directory once. Existing variables win. */
export function loadDotenv(root: string = process.cwd()): void {
  if (loaded) return;
  dotenv.config({ path: path.resolve(root, ".env"), override: false });
  loaded = true;
}

export function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || !v.trim()) {
    throw new Error(`Environment variable ${name} is required`);
  }
  return v.trim();
}

export function optionalEnv(name: string): string | undefined {
  const v = process.env[name];
  if (!v || !v.trim()) return undefined;
  return v.trim();
}

const SECRET_ENV_VARS = [
  "OPENROUTER_API_KEY",
  "OPENAI_API_KEY",
  "ANTHROPIC_API_KEY",
  "GOOGLE_GENERATIVE_AI_API_KEY",
  "SUPABASE_SERVICE_ROLE_KEY",
];

/** Values of the credential variables currently set, for redaction. */
export function configuredSecrets(): string[] {
  return SECRET_ENV_VARS.map(optionalEnv).filter(
    (v): v is string => v !== undefined
  );
}
