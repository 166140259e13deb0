import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigError,
  TestbuilderConfig,
  TestbuilderConfigSchema,
  resolveFrom,
} from '@testbuilder/shared';

export const CONFIG_FILENAME = 'testbuilder.yml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  cwd?: string; // Working directory (for the local config file)
  homeDir?: string;
}

export type LoadedConfig = TestbuilderConfig & {
  /** Files that contributed, lowest precedence first */
  sources: string[];
};

export class ConfigLoader {
  static loadYaml(filePath: string): Record<string, unknown> {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigError(`Config file ${filePath} must contain a mapping`);
    }
    return { ...parsed };
  }

  static load(options: ConfigOptions = {}): LoadedConfig {
    const cwd = options.cwd || process.cwd();
    const homeDir = options.homeDir || os.homedir();

    // Lowest precedence first: user config, local config, explicit --config.
    const candidates = [
      path.join(homeDir, '.testbuilder', 'config.yml'),
      path.join(cwd, CONFIG_FILENAME),
    ];
    if (options.configPath) {
      const explicit = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(explicit)) {
        throw new ConfigError(`Config file not found: ${explicit}`);
      }
      candidates.push(explicit);
    }

    let merged: Record<string, unknown> = {};
    const sources: string[] = [];
    for (const candidate of candidates) {
      const layer = this.loadYaml(candidate);
      if (Object.keys(layer).length > 0) {
        merged = { ...merged, ...layer };
        sources.push(candidate);
      }
    }

    const result = TestbuilderConfigSchema.safeParse(merged);
    if (!result.success) {
      const problems = result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      );
      throw new ConfigError(`Please configure ${CONFIG_FILENAME}`, {
        details: { problems, searched: candidates },
      });
    }

    return { ...this.resolvePaths(result.data, cwd), sources };
  }

  /**
   * Directories resolve against the working directory, except the manifest
   * and the test-source directory, which live in the target tree and resolve
   * against its root. Commands written as a path resolve against the working
   * directory; bare names keep their PATH lookup. `buildTool` runs inside the
   * target root and is left as written.
   */
  static resolvePaths(config: TestbuilderConfig, cwd: string): TestbuilderConfig {
    const targetRoot = resolveFrom(cwd, config.targetRoot);
    const asCommand = (command: string) =>
      /[\\/]/.test(command) ? resolveFrom(cwd, command) : command;
    return {
      ...config,
      generator: asCommand(config.generator),
      checker: asCommand(config.checker),
      targetRoot,
      simulatorRoot: resolveFrom(cwd, config.simulatorRoot),
      manifest: resolveFrom(targetRoot, config.manifest),
      testSourceDir: resolveFrom(targetRoot, config.testSourceDir),
    };
  }
}
