/**
 * Environment variable parsing utilities for configuration.
 * Maps environment variables to config paths with type coercion.
 */

import type { LogLevel, OutputFormat } from './constants.js';
import { LOG_LEVELS, OUTPUT_FORMATS } from './constants.js';

/**
 * Interface for reading environment variables.
 * Enables dependency injection for testing.
 */
export interface IEnvReader {
  /**
   * Get a string environment variable.
   */
  get(name: string): string | undefined;

  /**
   * Get a boolean environment variable with coercion.
   * Recognizes 'true', '1', 'yes' as true; 'false', '0', 'no' as false.
   */
  getBoolean(name: string): boolean | undefined;

  /**
   * Get a number environment variable with coercion.
   */
  getNumber(name: string): number | undefined;
}

/**
 * Default implementation using process.env.
 */
export class ProcessEnvReader implements IEnvReader {
  get(name: string): string | undefined {
    return process.env[name];
  }

  getBoolean(name: string): boolean | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;

    const lower = value.toLowerCase();
    if (lower === 'true' || lower === '1' || lower === 'yes') return true;
    if (lower === 'false' || lower === '0' || lower === 'no') return false;

    return undefined;
  }

  getNumber(name: string): number | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;

    const num = Number(value);
    return Number.isNaN(num) ? undefined : num;
  }
}

/**
 * Validator function type for env values.
 */
type EnvValidator = (value: string) => boolean;

/**
 * Environment variable to config path mappings.
 */
interface EnvMapping {
  envVar: string;
  path: string[];
  type: 'string' | 'boolean' | 'number';
  /** Optional validator - if provided and returns false, the value is dropped */
  validate?: EnvValidator;
}

function isValidLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isValidFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Positive integer validator.
 * Validates raw string value before number coercion.
 */
function isPositiveInteger(value: string): boolean {
  const num = Number(value);
  return !Number.isNaN(num) && Number.isInteger(num) && num > 0;
}

function isBooleanLike(value: string): boolean {
  return ['true', '1', 'yes', 'false', '0', 'no'].includes(value.toLowerCase());
}

/**
 * Static environment variable mappings.
 * Invalid values are silently dropped (fall back to file config or defaults).
 */
const ENV_MAPPINGS: EnvMapping[] = [
  { envVar: 'SKILLCHECK_SKILLS_DIR', path: ['skillsDir'], type: 'string' },
  { envVar: 'SKILLCHECK_FORMAT', path: ['format'], type: 'string', validate: isValidFormat },
  { envVar: 'SKILLCHECK_STRICT', path: ['strict'], type: 'boolean', validate: isBooleanLike },
  {
    envVar: 'SKILLCHECK_LOG_LEVEL',
    path: ['logLevel'],
    type: 'string',
    validate: isValidLogLevel,
  },
  {
    envVar: 'SKILLCHECK_MAX_DOCUMENT_LINES',
    path: ['limits', 'maxDocumentLines'],
    type: 'number',
    validate: isPositiveInteger,
  },
  {
    envVar: 'SKILLCHECK_MAX_REFERENCE_LINES',
    path: ['limits', 'maxReferenceLines'],
    type: 'number',
    validate: isPositiveInteger,
  },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a value at a nested path in an object.
 * Creates intermediate objects as needed.
 */
function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj;
  for (let i = 0; i < path.length - 1; i++) {
    const key = path[i];
    if (key === undefined) continue;
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = path[path.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Read environment variables and return a partial config object.
 * Only includes values that are present in environment variables.
 * The result is unvalidated; ConfigManager runs it through the schema after merging.
 */
export function readEnvConfig(
  envReader: IEnvReader = new ProcessEnvReader()
): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const mapping of ENV_MAPPINGS) {
    const rawValue = envReader.get(mapping.envVar);
    if (rawValue === undefined || rawValue === '') {
      continue;
    }

    if (mapping.validate !== undefined && !mapping.validate(rawValue)) {
      continue;
    }

    let value: string | boolean | number | undefined;
    switch (mapping.type) {
      case 'boolean':
        value = envReader.getBoolean(mapping.envVar);
        break;
      case 'number':
        value = envReader.getNumber(mapping.envVar);
        break;
      default:
        value = rawValue;
    }

    if (value !== undefined) {
      setNestedValue(config, mapping.path, value);
    }
  }

  return config;
}

/**
 * Names of all environment variables read by readEnvConfig.
 */
export function getEnvVariableNames(): string[] {
  return ENV_MAPPINGS.map((mapping) => mapping.envVar);
}
