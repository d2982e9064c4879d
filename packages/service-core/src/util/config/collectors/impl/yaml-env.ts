import * as yaml from 'yaml';

/**
 * Environment variables can be substituted into the YAML config
 * when parsing if the environment variable name starts with this prefix.
 * Attempting to substitute any other environment variable will throw an exception.
 *
 * Example of substitution:
 * storage:
 *    type: mongodb
 *    uri: !env CP_MONGO_URI
 */
const YAML_ENV_PREFIX = 'CP_';

/**
 * Custom YAML tag which performs string environment variable substitution.
 * `!env CP_PORT::number` and `!env CP_USE_HTTP::boolean` cast the value.
 */
export const YamlEnvTag: yaml.ScalarTag = {
  tag: '!env',
  resolve(envName: string, onError: (error: string) => void) {
    if (!envName.startsWith(YAML_ENV_PREFIX)) {
      onError(
        `Attempting to substitute environment variable ${envName} is not allowed. Variables must start with "${YAML_ENV_PREFIX}"`
      );
      return envName;
    }

    const [name, type = 'string'] = envName.split('::');
    const value = process.env[name];

    if (typeof value == 'undefined') {
      onError(`Environment variable "${name}" is not set.`);
      return envName;
    }

    switch (type) {
      case 'string':
        return value;
      case 'number': {
        const numberValue = Number(value);
        if (Number.isNaN(numberValue)) {
          onError(`Environment variable "${name}" is not a valid number. Got: "${value}".`);
          return envName;
        }
        return numberValue;
      }
      case 'boolean':
        if (value.toLowerCase() == 'true') {
          return true;
        } else if (value.toLowerCase() == 'false') {
          return false;
        }
        onError(`Environment variable "${name}" is not a boolean. Expected "true" or "false", got "${value}".`);
        return envName;
      default:
        onError(`Environment variable "${envName}" has an invalid type suffix "${type}".`);
        return envName;
    }
  }
};
