/**
 * `cloakroom.config.json` support.
 *
 * The file is looked up from the working directory upwards, like most
 * project-level tool configuration. Only Node's `fs` and `path` are used.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';

import { DEFAULT_OVERLAP_PAIRING, OVERLAP_PAIRINGS } from '@cloakroom/optimizer';
import type { OverlapPairing } from '@cloakroom/optimizer';
import {
  CloakroomErrorCode,
  InputError,
  isNonEmptyString,
  isPlainObject,
  isValidPublicKey,
  parseLogLevel,
  sanitizeJsonInput,
} from '@cloakroom/types';
import type { LogLevelName } from '@cloakroom/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Validated contents of a `cloakroom.config.json` file. */
export interface CloakroomConfig {
  /** The single administrator identity. */
  adminId: string;
  /** Recognized employees. When absent, every identity is recognized. */
  employees?: string[];
  /** Hex Ed25519 key the co-processor signs decryption results with. */
  coprocessorPublicKey: string;
  logLevel: LogLevelName;
  overlapPairing: OverlapPairing;
}

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'cloakroom.config.json';

const CONFIG_HINT = `Check ${CONFIG_FILE_NAME}: adminId and coprocessorPublicKey are required.`;

function invalid(message: string, context?: Record<string, unknown>): InputError {
  return new InputError(CloakroomErrorCode.CONFIG_INVALID, message, { hint: CONFIG_HINT, context });
}

function isLogLevelName(value: string): value is LogLevelName {
  return parseLogLevel(value) !== undefined && value === value.toLowerCase();
}

function isOverlapPairing(value: unknown): value is OverlapPairing {
  return OVERLAP_PAIRINGS.some((pairing) => pairing === value);
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Search for `cloakroom.config.json` starting from `cwd` and walking up
 * to the filesystem root. Returns the absolute path, or `undefined`.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');

  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = resolve(dir, '..');
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

/**
 * Validate a parsed configuration object and fill in defaults.
 *
 * @throws {InputError} CONFIG_INVALID naming the offending field.
 */
export function parseConfig(raw: unknown): CloakroomConfig {
  if (!isPlainObject(raw)) {
    throw invalid('Configuration must be a JSON object');
  }

  const { adminId, employees, coprocessorPublicKey, logLevel, overlapPairing } = raw;

  if (!isNonEmptyString(adminId)) {
    throw invalid('adminId must be a non-empty string', { field: 'adminId' });
  }
  if (!isValidPublicKey(coprocessorPublicKey)) {
    throw invalid('coprocessorPublicKey must be a 64-character hex string', {
      field: 'coprocessorPublicKey',
    });
  }

  let employeeList: string[] | undefined;
  if (employees !== undefined) {
    if (!Array.isArray(employees) || !employees.every(isNonEmptyString)) {
      throw invalid('employees must be an array of non-empty strings', { field: 'employees' });
    }
    employeeList = [...employees];
  }

  let level: LogLevelName = 'info';
  if (logLevel !== undefined) {
    if (typeof logLevel !== 'string' || !isLogLevelName(logLevel)) {
      throw invalid('logLevel must be one of debug, info, warn, error, silent', { field: 'logLevel' });
    }
    level = logLevel;
  }

  let pairing: OverlapPairing = DEFAULT_OVERLAP_PAIRING;
  if (overlapPairing !== undefined) {
    if (!isOverlapPairing(overlapPairing)) {
      throw invalid(`overlapPairing must be one of ${OVERLAP_PAIRINGS.join(', ')}`, {
        field: 'overlapPairing',
      });
    }
    pairing = overlapPairing;
  }

  const config: CloakroomConfig = {
    adminId,
    coprocessorPublicKey: coprocessorPublicKey.toLowerCase(),
    logLevel: level,
    overlapPairing: pairing,
  };
  if (employeeList) {
    config.employees = employeeList;
  }
  return config;
}

/** Read and validate a configuration file at an explicit path. */
export function readConfigFile(filePath: string): CloakroomConfig {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new InputError(
      CloakroomErrorCode.CONFIG_INVALID,
      `Cannot read ${filePath}`,
      { hint: CONFIG_HINT, cause: err instanceof Error ? err : undefined },
    );
  }
  let parsed: unknown;
  try {
    parsed = sanitizeJsonInput(text);
  } catch (err) {
    throw new InputError(
      CloakroomErrorCode.CONFIG_INVALID,
      `${filePath} is not valid JSON`,
      { hint: CONFIG_HINT, cause: err instanceof Error ? err : undefined },
    );
  }
  return parseConfig(parsed);
}

/**
 * Find and load `cloakroom.config.json` starting from `cwd`.
 * Returns `undefined` when no file is found.
 */
export function loadConfig(cwd?: string): CloakroomConfig | undefined {
  const filePath = findConfigFile(cwd);
  return filePath === undefined ? undefined : readConfigFile(filePath);
}
