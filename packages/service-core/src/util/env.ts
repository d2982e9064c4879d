import { utils } from '@changeplane/lib-services-framework';

export const env = utils.collectEnvironmentVariables({
  /**
   * Path to configuration file in filesystem
   */
  CP_CONFIG_PATH: utils.type.string.optional(),
  /**
   * Base64 encoded contents of configuration file
   */
  CP_CONFIG_B64: utils.type.string.optional(),
  /**
   * Reported by the status endpoint
   */
  CP_GIT_HASH: utils.type.string.default('unknown'),

  NODE_ENV: utils.type.string.optional()
});

export type Env = typeof env;
