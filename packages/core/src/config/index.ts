/**
 * 환경 변수 기반 설정 로드
 */

import dotenv from 'dotenv';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import {
  CONFIG_DIR_NAME,
  REGISTRY_FILENAME,
  REQUEST_TIMEOUT,
  DEFAULT_TRANSCODE_BITRATE,
  ConfigurationError,
} from '@jellyfzf/shared';
import type { LogLevel } from '../utils/index.js';

export type PickerKind = 'fzf' | 'embedded';

export interface AppConfig {
  configDir: string;
  registryPath: string;
  picker: PickerKind;
  fzfBin: string;
  player: string;
  requestTimeoutMs: number;
  forceTranscode: boolean;
  transcodeBitrate: number;
  logLevel: LogLevel;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  JELLYFZF_CONFIG_DIR: z.string().min(1).optional(),
  XDG_CONFIG_HOME: z.string().min(1).optional(),
  JELLYFZF_PICKER: z.enum(['fzf', 'embedded']).default('fzf'),
  JELLYFZF_FZF_BIN: z.string().min(1).default('fzf'),
  JELLYFZF_PLAYER: z.string().min(1).default('ffplay'),
  JELLYFZF_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(REQUEST_TIMEOUT),
  JELLYFZF_FORCE_TRANSCODE: booleanFlag.default('false'),
  JELLYFZF_TRANSCODE_BITRATE: z.coerce.number().int().positive().default(DEFAULT_TRANSCODE_BITRATE),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
});

/**
 * .env 파일 로드 (이미 설정된 환경 변수는 덮어쓰지 않음)
 */
export function loadEnvFile(): void {
  dotenv.config();
}

/**
 * 설정 디렉토리 결정: JELLYFZF_CONFIG_DIR > $XDG_CONFIG_HOME/jellyfzf > ~/.config/jellyfzf
 */
function resolveConfigDir(explicitDir: string | undefined, xdgConfigHome: string | undefined): string {
  if (explicitDir) {
    return path.resolve(explicitDir);
  }
  const base = xdgConfigHome ?? path.join(os.homedir(), '.config');
  return path.join(base, CONFIG_DIR_NAME);
}

/**
 * 설정 로드
 *
 * @param env - 환경 변수 (테스트에서 주입)
 * @param overrides - CLI 플래그 값
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<AppConfig> = {}
): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue ? issue.path.join('.') : undefined;
    throw new ConfigurationError(
      `Invalid configuration${key ? ` for ${key}` : ''}: ${issue ? issue.message : 'unknown issue'}`,
      { configKey: key }
    );
  }

  const parsed = result.data;
  const configDir = overrides.configDir ?? resolveConfigDir(parsed.JELLYFZF_CONFIG_DIR, parsed.XDG_CONFIG_HOME);

  return {
    configDir,
    registryPath: overrides.registryPath ?? path.join(configDir, REGISTRY_FILENAME),
    picker: overrides.picker ?? parsed.JELLYFZF_PICKER,
    fzfBin: overrides.fzfBin ?? parsed.JELLYFZF_FZF_BIN,
    player: overrides.player ?? parsed.JELLYFZF_PLAYER,
    requestTimeoutMs: overrides.requestTimeoutMs ?? parsed.JELLYFZF_REQUEST_TIMEOUT_MS,
    forceTranscode: overrides.forceTranscode ?? parsed.JELLYFZF_FORCE_TRANSCODE,
    transcodeBitrate: overrides.transcodeBitrate ?? parsed.JELLYFZF_TRANSCODE_BITRATE,
    logLevel: overrides.logLevel ?? parsed.LOG_LEVEL,
  };
}
