/**
 * Runtime configuration for navigators.
 *
 * Priority: explicit options > environment > defaults.
 *
 *   DEBUG=1                  Log index construction and scope lookups
 *   DEPGRAPH_EAGER_INDEX=1   Build all reference indexes when a navigator is created
 */

export interface NavigatorConfig {
  debug: boolean;
  eagerIndex: boolean;
}

export type Env = Record<string, string | undefined>;

const DEFAULTS: NavigatorConfig = {
  debug: false,
  eagerIndex: false,
};

function isEnabled(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
}

export function loadConfig(env: Env = process.env, overrides: Partial<NavigatorConfig> = {}): NavigatorConfig {
  return {
    debug: overrides.debug ?? isEnabled(env.DEBUG) ?? DEFAULTS.debug,
    eagerIndex: overrides.eagerIndex ?? isEnabled(env.DEPGRAPH_EAGER_INDEX) ?? DEFAULTS.eagerIndex,
  };
}
