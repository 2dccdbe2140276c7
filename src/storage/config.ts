/**
 * Config Manager Module
 *
 * Configuration for annotation runs:
 * - Zod schema validation with defaults for every field
 * - Loading from `syntree-comments.json` (or an explicit path)
 * - Generation of a documented default config file
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { ASSOCIATION_POLICIES, DEFAULT_ASSOCIATION_POLICY } from '../engines/commentAssociator.js';
import { fileNotFound, invalidConfig } from '../errors/index.js';
import { atomicWrite } from '../utils/atomicWrite.js';
import { getLogger } from '../utils/logger.js';

// ============================================================================
// Config Schema
// ============================================================================

/**
 * Zod schema for configuration validation
 *
 * Underscore-prefixed fields (_comment, etc.) are stripped before parsing.
 */
export const ConfigSchema = z
  .object({
    /** How comments are matched to constructs */
    associationPolicy: z.enum(['conservative', 'nearest']).default(DEFAULT_ASSOCIATION_POLICY),

    /** Extract `//` comments */
    includeLineComments: z.boolean().default(true),

    /** Extract single-line block comments */
    includeBlockComments: z.boolean().default(true),

    /** Omit spans from JSON output */
    compactJson: z.boolean().default(false),

    /** Indent JSON output */
    prettyJson: z.boolean().default(true),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Config with documentation fields for generated config files
 */
export interface ConfigWithDocs extends Config {
  _comment?: string;
  _availableOptions?: Record<string, string>;
}

export const DEFAULT_CONFIG: Config = {
  associationPolicy: DEFAULT_ASSOCIATION_POLICY,
  includeLineComments: true,
  includeBlockComments: true,
  compactJson: false,
  prettyJson: true,
};

export interface LoadConfigOptions {
  /**
   * The path was given explicitly: a missing or invalid file is an error
   * instead of a fallback to defaults
   */
  required?: boolean;
}

// ============================================================================
// Config I/O Functions
// ============================================================================

/**
 * Load configuration from a file
 *
 * Unless `required` is set, falls back to defaults if:
 * - File doesn't exist
 * - File is not valid JSON
 * - Content fails schema validation
 *
 * @param configPath - Path to the config file
 * @throws SyntreeError FILE_NOT_FOUND or INVALID_CONFIG when `required` is set
 *
 * @example
 * ```typescript
 * const config = await loadConfig(getConfigPath(process.cwd()));
 * console.log(config.associationPolicy); // "conservative"
 * ```
 */
export async function loadConfig(configPath: string, options: LoadConfigOptions = {}): Promise<Config> {
  const logger = getLogger();

  if (!fs.existsSync(configPath)) {
    if (options.required) {
      throw fileNotFound(configPath);
    }
    logger.debug('ConfigManager', 'No config file found, using defaults', { configPath });
    return { ...DEFAULT_CONFIG };
  }

  let problem: string;
  try {
    const content = await fs.promises.readFile(configPath, 'utf-8');
    const rawConfig: unknown = JSON.parse(content);
    const result = ConfigSchema.safeParse(stripDocumentationFields(rawConfig));

    if (result.success) {
      logger.debug('ConfigManager', 'Config loaded successfully', { configPath });
      return result.data;
    }

    problem = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
  } catch (error) {
    problem = error instanceof Error ? error.message : String(error);
  }

  if (options.required) {
    throw invalidConfig(configPath, problem);
  }

  logger.warn('ConfigManager', 'Config validation failed, using defaults', {
    configPath,
    errors: problem,
  });
  return { ...DEFAULT_CONFIG };
}

/**
 * Generate a default config file with documentation fields
 *
 * @param configPath - Where to write the file
 */
export async function generateDefaultConfig(configPath: string): Promise<void> {
  const configWithDocs: ConfigWithDocs = {
    _comment: 'syntree-comments configuration. Command-line flags override these settings.',
    _availableOptions: {
      associationPolicy: `Comment matching policy: ${ASSOCIATION_POLICIES.join(' | ')} (default: "${DEFAULT_ASSOCIATION_POLICY}")`,
      includeLineComments: 'Extract // comments (default: true)',
      includeBlockComments: 'Extract single-line /* */ comments (default: true)',
      compactJson: 'Omit all spans from JSON output (default: false)',
      prettyJson: 'Indent JSON output (default: true)',
    },
    ...DEFAULT_CONFIG,
  };

  await atomicWrite(configPath, JSON.stringify(configWithDocs, null, 2) + '\n');

  getLogger().info('ConfigManager', 'Generated default config file', { configPath });
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Strip underscore-prefixed documentation fields from a parsed config.
 * Non-object values pass through for the schema to reject.
 */
function stripDocumentationFields(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  const result: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    if (!key.startsWith('_')) {
      result[key] = field;
    }
  }
  return result;
}
