/**
 * Configuration parser
 * Order: default < env
 */
export type ConfigValue = string | boolean | Record<string, unknown> | undefined;

export type ConfigType = 'string' | 'boolean' | 'json';

export type ConfigEntry = [
  string, // config key
  string, // env variable
  string | boolean | Record<string, unknown>, // default value
  ConfigType?, // type, string when omitted
];

export type ConfigTemplate = ConfigEntry[];

export type RawConfig = Record<string, ConfigValue>;

const parseJson = (value: string, origin: string): Record<string, unknown> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (e) {
    throw new Error(`Error parsing JSON from ${origin}: ${String(e)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Error parsing JSON from ${origin}: not an object`);
  }
  return { ...parsed };
};

export class ConfigParser {
  constructor(
    private readonly template: ConfigTemplate,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  parse(): RawConfig {
    const result: RawConfig = {};
    for (const [key, envVar, defaultValue, type] of this.template) {
      let value: ConfigValue = defaultValue;

      // Override with env value if exists
      const envValue = this.env[envVar];
      if (envValue !== undefined) {
        if (type === 'boolean') {
          value = envValue.toLowerCase() === 'true';
        } else if (type === 'json') {
          value = parseJson(envValue, `environment variable ${envVar}`);
        } else {
          value = envValue;
        }
      }

      result[key] = value;
    }
    return result;
  }
}

export function parseConfig(
  template: ConfigTemplate,
  env: NodeJS.ProcessEnv = process.env
): RawConfig {
  const parser = new ConfigParser(template, env);
  return parser.parse();
}
