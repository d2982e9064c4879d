import * as yaml from 'yaml';

import { schema } from '@changeplane/lib-services-framework';
import { configFile } from '@changeplane/service-types';

import { RunnerConfig } from '../types.js';
import { YamlEnvTag } from './impl/yaml-env.js';

export enum ConfigFileFormat {
  YAML = 'yaml',
  JSON = 'json'
}

// ts-codec itself doesn't give great validation errors, so we use json schema for that
const configSchemaValidator = schema.createSchemaValidator<configFile.SerializedControlPlaneConfig>(
  configFile.ControlPlaneConfigJSONSchema
);

export abstract class ConfigCollector {
  abstract get name(): string;

  /**
   * Collects the serialized configuration.
   * @returns null if this collector cannot provide a config
   */
  abstract collectSerialized(runnerConfig: RunnerConfig): Promise<configFile.SerializedControlPlaneConfig | null>;

  /**
   * Collects, validates and decodes the configuration.
   * @returns null if this collector cannot provide a config
   */
  async collect(runner_config: RunnerConfig): Promise<configFile.ControlPlaneConfig | null> {
    const serialized = await this.collectSerialized(runner_config);
    if (!serialized) {
      return null;
    }

    /**
     * After this point a serialized config has been found. Any failures to decode or validate
     * will result in a hard stop.
     */
    this.validate(serialized);
    return this.decode(serialized);
  }

  validate(config: configFile.SerializedControlPlaneConfig) {
    const valid = configSchemaValidator.validate(config);
    if (!valid.valid) {
      throw new Error(`Failed to validate config: ${valid.errors.join(', ')}`);
    }
  }

  decode(encoded: configFile.SerializedControlPlaneConfig): configFile.ControlPlaneConfig {
    try {
      return configFile.controlPlaneConfig.decode(encoded);
    } catch (ex) {
      throw new Error(`Failed to decode config: ${ex}`);
    }
  }

  protected parseContent(content: string, contentType?: ConfigFileFormat) {
    switch (contentType) {
      case ConfigFileFormat.YAML:
        return this.parseYaml(content);
      case ConfigFileFormat.JSON:
        return this.parseJSON(content);
      default: {
        // JSON is valid YAML, apart from YAML-only syntax errors
        try {
          return this.parseYaml(content);
        } catch (yamlError) {
          try {
            return this.parseJSON(content);
          } catch (ex) {
            throw new Error(`Could not parse config file content as JSON or YAML: ${yamlError}`);
          }
        }
      }
    }
  }

  protected parseYaml(content: string) {
    const lineCounter = new yaml.LineCounter();

    const parsed = yaml.parseDocument(content, {
      schema: 'core',
      keepSourceTokens: true,
      lineCounter,
      customTags: [YamlEnvTag]
    });

    if (parsed.errors.length) {
      throw new Error(
        `Could not parse YAML configuration file. Received errors: \n ${parsed.errors.map((e) => e.message).join('\n')}`
      );
    }

    return parsed.toJS();
  }

  protected parseJSON(content: string) {
    return JSON.parse(content);
  }
}
