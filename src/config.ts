import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS } from './log.js';
import { DEFAULT_TEXT_SIZE, TEXT_SIZE_MAX, TEXT_SIZE_MIN, THEMES } from './preferences.js';

export const ColorModeSchema = z.enum(['auto', 'always', 'never']);

export type ColorMode = z.infer<typeof ColorModeSchema>;

export const EnvSchema = z.object({
  TODO_DESK_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  TODO_DESK_TEXT_SIZE: z.coerce.number().min(TEXT_SIZE_MIN).max(TEXT_SIZE_MAX).optional(),
  TODO_DESK_THEME: z.enum(THEMES).optional(),
  TODO_DESK_COLOR: ColorModeSchema.optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  return parsed.data;
}

export function useColor(mode: ColorMode, isTTY: boolean | undefined): boolean {
  if (mode === 'always') return true;
  if (mode === 'never') return false;
  return !!isTTY;
}

export function configReport(env = readEnv()) {
  return {
    logLevel: env.TODO_DESK_LOG_LEVEL ?? 'warn',
    textSize: env.TODO_DESK_TEXT_SIZE ?? DEFAULT_TEXT_SIZE,
    theme: env.TODO_DESK_THEME ?? 'light',
    color: env.TODO_DESK_COLOR ?? 'auto',
    notes: [
      'Files are chosen per session; there is no default task file.',
      `Text size accepts ${TEXT_SIZE_MIN}..${TEXT_SIZE_MAX}.`,
    ],
  };
}
