const ENV_REF = /\$\{(\w+)(?::-([^}]*))?\}/g;

/**
 * Replace `${VAR}` and `${VAR:-fallback}` in every string of a parsed config
 * tree. Unset variables without a fallback expand to "".
 */
export function expandEnvVarsDeep(
  obj: unknown,
  env: Record<string, string | undefined>,
): unknown {
  if (typeof obj === "string") {
    return obj.replace(ENV_REF, (_match, key: string, fallback: string | undefined) => {
      const value = env[key];
      if (value !== undefined && value !== "") return value;
      return fallback ?? "";
    });
  }
  if (Array.isArray(obj)) return obj.map((v) => expandEnvVarsDeep(v, env));
  if (obj && typeof obj === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) out[k] = expandEnvVarsDeep(v, env);
    return out;
  }
  return obj;
}
