import * as fs from 'fs';
import * as path from 'path';
import { errorMessage, logWarning } from './diagnostics';
import { Severity, isRecord, isStringArray } from './types';

/**
 * Configuration schema for cpp-flowgraph
 */
export interface FlowgraphConfig {
  /**
   * File extensions analyzed as C/C++ sources and headers
   * @default [".cpp", ".hpp", ".h", ".cc", ".cxx"]
   */
  extensions?: string[];

  /**
   * Glob patterns of files or directories to skip.
   * Added to the defaults (build output, VCS data, tests).
   * @example ["**\/third_party/**"]
   */
  ignore?: string[];

  /**
   * Directory (relative to the project root) for cached analysis and saved IR
   * @default ".flowgraph-cache"
   */
  cacheDir?: string;

  /**
   * Analyze files in worker threads
   * @default false
   */
  parallel?: boolean;

  /**
   * Number of worker threads, 0 for one less than the CPU count
   * @default 0
   */
  workers?: number;

  /**
   * Largest graph a scoped query may return before it is cut down
   * @default 10000
   */
  maxGraphNodes?: number;

  /**
   * Project name used for the ProjectIR; empty means the root directory name
   * @default ""
   */
  projectName?: string;

  /**
   * Minimum severity of diagnostics to report
   * @default "medium"
   */
  minSeverity?: Severity;
}

const CONFIG_FILES = [
  'flowgraph.config.js',
  'flowgraph.config.json',
  '.flowgraphrc',
  '.flowgraphrc.json',
];

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Required<FlowgraphConfig> = {
  extensions: ['.cpp', '.hpp', '.h', '.cc', '.cxx'],
  ignore: [
    '**/build/**',
    '**/cmake-build/**',
    '**/.git/**',
    '**/node_modules/**',
    '**/test/**',
    '**/tests/**',
  ],
  cacheDir: '.flowgraph-cache',
  parallel: false,
  workers: 0,
  maxGraphNodes: 10000,
  projectName: '',
  minSeverity: 'medium',
};

/**
 * Result of loading config
 */
export interface LoadConfigResult {
  config: Required<FlowgraphConfig>;
  configPath: string | null;
}

/**
 * Load configuration from the nearest config file
 * @param startDir Directory to start searching from
 * @returns Merged configuration with defaults
 */
export function loadConfig(startDir: string): Required<FlowgraphConfig> {
  return loadConfigWithInfo(startDir).config;
}

/**
 * Load configuration and report which file it came from
 * @param startDir Directory to start searching from
 */
export function loadConfigWithInfo(startDir: string): LoadConfigResult {
  const configPath = findConfigFile(startDir);
  let userConfig: FlowgraphConfig = {};

  if (configPath) {
    try {
      userConfig = loadConfigFile(configPath);
    } catch (error) {
      logWarning(`Could not load config from ${configPath}: ${errorMessage(error)}`);
    }
  }

  return {
    config: mergeConfig(DEFAULT_CONFIG, userConfig),
    configPath,
  };
}

/**
 * Find the nearest config file by walking up the directory tree
 */
function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir);
  const root = path.parse(dir).root;

  while (dir !== root) {
    for (const configFile of CONFIG_FILES) {
      const configPath = path.join(dir, configFile);
      if (fs.existsSync(configPath)) {
        return configPath;
      }
    }
    dir = path.dirname(dir);
  }

  return null;
}

/**
 * Load and parse a config file
 */
function loadConfigFile(configPath: string): FlowgraphConfig {
  const ext = path.extname(configPath);

  if (ext === '.json' || configPath.endsWith('.flowgraphrc')) {
    const content = fs.readFileSync(configPath, 'utf-8');
    return validateConfig(JSON.parse(content), configPath);
  }

  if (ext === '.js') {
    // For CommonJS config files, use require
    const loaded: unknown = require(configPath);
    const config = isRecord(loaded) && loaded.default !== undefined ? loaded.default : loaded;
    return validateConfig(config, configPath);
  }

  throw new Error(`Unsupported config file format: ${ext}`);
}

function isSeverity(value: unknown): value is Severity {
  return value === 'high' || value === 'medium' || value === 'low';
}

/**
 * Keep the well-typed fields of a loaded config object.
 * Fields of the wrong type are reported and ignored.
 */
export function validateConfig(value: unknown, source: string): FlowgraphConfig {
  if (!isRecord(value)) {
    throw new Error(`${source} does not contain a configuration object`);
  }

  const config: FlowgraphConfig = {};
  const invalid: string[] = [];

  const stringArray = (key: 'extensions' | 'ignore'): void => {
    const field = value[key];
    if (field === undefined) return;
    if (isStringArray(field)) config[key] = field;
    else invalid.push(key);
  };
  stringArray('extensions');
  stringArray('ignore');

  if (value.cacheDir !== undefined) {
    if (typeof value.cacheDir === 'string') config.cacheDir = value.cacheDir;
    else invalid.push('cacheDir');
  }
  if (value.projectName !== undefined) {
    if (typeof value.projectName === 'string') config.projectName = value.projectName;
    else invalid.push('projectName');
  }
  if (value.parallel !== undefined) {
    if (typeof value.parallel === 'boolean') config.parallel = value.parallel;
    else invalid.push('parallel');
  }
  if (value.workers !== undefined) {
    if (typeof value.workers === 'number' && value.workers >= 0) config.workers = value.workers;
    else invalid.push('workers');
  }
  if (value.maxGraphNodes !== undefined) {
    if (typeof value.maxGraphNodes === 'number' && value.maxGraphNodes > 0) {
      config.maxGraphNodes = value.maxGraphNodes;
    } else {
      invalid.push('maxGraphNodes');
    }
  }
  if (value.minSeverity !== undefined) {
    if (isSeverity(value.minSeverity)) config.minSeverity = value.minSeverity;
    else invalid.push('minSeverity');
  }

  if (invalid.length > 0) {
    logWarning(`Ignoring invalid config field(s) in ${source}: ${invalid.join(', ')}`);
  }

  return config;
}

/**
 * Merge user config with defaults
 */
export function mergeConfig(
  defaults: Required<FlowgraphConfig>,
  userConfig: Partial<FlowgraphConfig>
): Required<FlowgraphConfig> {
  return {
    extensions: userConfig.extensions ?? defaults.extensions,
    ignore: [...defaults.ignore, ...(userConfig.ignore || [])],
    cacheDir: userConfig.cacheDir ?? defaults.cacheDir,
    parallel: userConfig.parallel ?? defaults.parallel,
    workers: userConfig.workers ?? defaults.workers,
    maxGraphNodes: userConfig.maxGraphNodes ?? defaults.maxGraphNodes,
    projectName: userConfig.projectName ?? defaults.projectName,
    minSeverity: userConfig.minSeverity ?? defaults.minSeverity,
  };
}

/**
 * Glob pattern matching every configured extension.
 */
export function sourcePattern(extensions: readonly string[]): string {
  const names = extensions.map((ext) => ext.replace(/^\./, ''));
  return names.length === 1 ? `**/*.${names[0]}` : `**/*.{${names.join(',')}}`;
}
