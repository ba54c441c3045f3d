/** Environment variables read by `resolveConfig`. */
export const DOCBRIDGE_ENV = {
  HOST: "DOCBRIDGE_HOST",
  LOG_LEVEL: "DOCBRIDGE_LOG_LEVEL",
  LOG_FORMAT: "DOCBRIDGE_LOG_FORMAT",
  STRICT_CONVERSION: "DOCBRIDGE_STRICT_CONVERSION",
} as const;

export function getEnv(
  key: keyof typeof DOCBRIDGE_ENV,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const raw = env[DOCBRIDGE_ENV[key]];
  return raw === undefined || raw === "" ? undefined : raw;
}
