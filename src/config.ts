import os from 'os';
import path from 'path';
import { isLogThreshold, LogThreshold } from './utils/logger';

export interface AppConfig {
  port: number;
  containerRuntime: string;
  toolImage: string;
  toolCommand: string;
  mountPoint: string;
  timeoutMs: number;
  killGraceMs: number;
  stagingRoot: string;
  staticDir: string;
  logLevel: LogThreshold;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = readString(env, 'LOG_LEVEL', 'info');
  if (!isLogThreshold(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error, silent, got "${logLevel}"`);
  }

  return {
    port: readPositiveInt(env, 'PORT', 3000),
    containerRuntime: readString(env, 'CONTAINER_RUNTIME', 'docker'),
    toolImage: readString(env, 'MESH_TOOL_IMAGE', 'trophime/gmsh'),
    toolCommand: readString(env, 'MESH_TOOL_COMMAND', 'gmsh'),
    mountPoint: readString(env, 'MESH_TOOL_MOUNT', '/app'),
    timeoutMs: readPositiveInt(env, 'CONVERT_TIMEOUT_MS', 60_000),
    killGraceMs: readPositiveInt(env, 'KILL_GRACE_MS', 5_000),
    // must be a path the container runtime's host can bind-mount
    stagingRoot: readString(env, 'STAGING_ROOT', os.tmpdir()),
    staticDir: readString(env, 'STATIC_DIR', path.join(__dirname, '..', 'public')),
    logLevel,
  };
}
