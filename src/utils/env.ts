// Environment lookups shared by the CLI, the headless runner and scripts
export function getEnv(name: string): string | null {
  const v = typeof process !== "undefined" ? process.env[name] : undefined;
  return v && v.length > 0 ? v : null;
}

export function getEnvFlag(name: string): boolean {
  const v = getEnv(name);
  return v === "1" || v === "true";
}

export function getEnvInt(name: string, fallback: number): number {
  const v = getEnv(name);
  if (v && /^\d+$/.test(v)) return parseInt(v, 10);
  return fallback;
}
