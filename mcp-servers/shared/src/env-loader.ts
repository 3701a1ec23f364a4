/**
 * Shared environment loading utilities
 * Loads the workspace .env file and reads cleaned values from process.env
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

const WORKSPACE_PACKAGE_NAME = 'review-tracker-workspace';

/**
 * Options for loading environment variables
 */
export interface EnvLoaderOptions {
  /** Custom path to .env file (overrides default resolution) */
  envPath?: string;
  /** Directory to start the project root search from (default: process.cwd()) */
  startDir?: string;
  /** Whether to throw an error if .env file is not found (default: false) */
  required?: boolean;
  /** Additional environment variables to set (useful for testing) */
  overrides?: Record<string, string>;
}

function isWorkspaceManifest(pkgPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf8'));
    if (!pkg || typeof pkg !== 'object') return false;
    return 'workspaces' in pkg || ('name' in pkg && pkg.name === WORKSPACE_PACKAGE_NAME);
  } catch (error) {
    console.error(`⚠️ Could not read ${pkgPath}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

/**
 * Find the project root by looking for a .env file or the workspace package.json
 * Falls back to the start directory when neither is found
 */
export function findProjectRoot(startDir: string): string {
  let currentDir = path.resolve(startDir);

  while (currentDir !== path.dirname(currentDir)) {
    if (fs.existsSync(path.join(currentDir, '.env'))) {
      return currentDir;
    }
    const pkgPath = path.join(currentDir, 'package.json');
    if (fs.existsSync(pkgPath) && isWorkspaceManifest(pkgPath)) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return path.resolve(startDir);
}

/**
 * Load environment variables from the workspace .env file
 *
 * @returns The resolved path to the .env file (or null if not found)
 *
 * @example
 * ```typescript
 * import { loadEnv } from '@review-tracker/shared';
 *
 * // In your server entry point:
 * loadEnv();
 * ```
 */
export function loadEnv(options: EnvLoaderOptions = {}): string | null {
  const envPath = options.envPath
    ?? path.resolve(findProjectRoot(options.startDir ?? process.cwd()), '.env');

  if (!fs.existsSync(envPath)) {
    if (options.required) {
      throw new Error(`Required .env file not found at: ${envPath}`);
    }
    return null;
  }

  dotenv.config({ path: envPath });

  if (options.overrides) {
    for (const [key, value] of Object.entries(options.overrides)) {
      process.env[key] = value;
    }
  }

  return envPath;
}

function clean(value: string): string {
  return value.trim().replace(/\r\n?/g, '');
}

/**
 * Get optional environment variable with default
 */
export function getEnv(name: string, defaultValue: string = '', env: NodeJS.ProcessEnv = process.env): string {
  const value = env[name];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return clean(value);
}

/**
 * Split a comma-separated environment value into trimmed, non-empty entries
 */
export function getEnvList(name: string, defaultValue: string[], env: NodeJS.ProcessEnv = process.env): string[] {
  const raw = getEnv(name, '', env);
  if (!raw) return defaultValue;
  const entries = raw.split(',').map(entry => entry.trim()).filter(Boolean);
  return entries.length > 0 ? entries : defaultValue;
}
