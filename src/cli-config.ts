import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { COLORLESS_RENDER_CONFIG, DEFAULT_RENDER_CONFIG, type RenderConfig } from './render-config.js';

const promptConfigSchema = z
  .object({
    $schema: z.string().optional().describe('JSON Schema reference for editor autocomplete'),
    pageSize: z.int().min(1).optional().default(7).catch(7).describe('Number of options shown at once by list prompts'),
    vimMode: z.boolean().optional().default(false).catch(false).describe('Navigate lists and calendars with h/j/k/l as well as the arrow keys'),
    color: z.enum(['auto', 'always', 'never']).optional().default('auto').catch('auto').describe('Whether prompts use colors. "auto" honours the NO_COLOR environment variable'),
    showHelp: z.boolean().optional().default(true).catch(true).describe('Show the key help line below prompts'),
    debugLog: z.string().min(1).nullable().optional().default(null).catch(null).describe('File to append a trace of keys and actions to. null disables the trace'),
  })
  .meta({ title: 'keyprompt configuration', description: 'Defaults shared by every keyprompt prompt' });

export type PromptConfig = Omit<z.infer<typeof promptConfigSchema>, '$schema'>;

export const DEFAULT_PROMPT_CONFIG: Readonly<PromptConfig> = Object.freeze(parseCliConfig({}));

export const CONFIG_PATH = resolve(homedir(), '.config', 'keyprompt', 'config.json');

export type Environment = Record<string, string | undefined>;

const STRIP_KEYS = new Set(['required', 'additionalProperties']);

function cleanSchema(obj: unknown, isRoot = false): unknown {
  if (Array.isArray(obj)) {
    return obj.map((item) => cleanSchema(item));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (key === 'maximum' && value === Number.MAX_SAFE_INTEGER) {
        continue;
      }
      if (isRoot && STRIP_KEYS.has(key)) {
        continue;
      }
      result[key] = cleanSchema(value);
    }
    return result;
  }
  return obj;
}

export function generateJsonSchema(): unknown {
  const raw = z.toJSONSchema(promptConfigSchema, { target: 'draft-7' });
  return cleanSchema(raw, true);
}

/** @private Exported for testing only. */
export function parseCliConfig(raw: unknown): PromptConfig {
  const { $schema: _, ...config } = promptConfigSchema.parse(raw);
  return config;
}

/**
 * Environment overrides: a non-empty NO_COLOR turns "auto" color off,
 * KEYPROMPT_DEBUG_LOG names the trace file.
 */
export function applyEnvironment(config: PromptConfig, env: Environment): PromptConfig {
  const noColor = env.NO_COLOR !== undefined && env.NO_COLOR !== '';
  const debugLog = env.KEYPROMPT_DEBUG_LOG;
  return {
    ...config,
    color: config.color === 'auto' && noColor ? 'never' : config.color,
    debugLog: debugLog ? debugLog : config.debugLog,
  };
}

export function loadCliConfig(path = CONFIG_PATH, env: Environment = process.env): { config: PromptConfig; warnings: string[]; path: string | null } {
  if (!existsSync(path)) {
    return { config: applyEnvironment(DEFAULT_PROMPT_CONFIG, env), warnings: [], path: null };
  }

  try {
    const raw = JSON.parse(readFileSync(path, 'utf8'));
    const config = parseCliConfig(raw);
    return { config: applyEnvironment(config, env), warnings: [], path };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { config: applyEnvironment(DEFAULT_PROMPT_CONFIG, env), warnings: [`Failed to parse ${path}: ${reason}`], path };
  }
}

export function resolveRenderConfig(config: PromptConfig): Readonly<RenderConfig> {
  return config.color === 'never' ? COLORLESS_RENDER_CONFIG : DEFAULT_RENDER_CONFIG;
}

export function initConfig(log: (msg: string) => void, path = CONFIG_PATH): void {
  if (existsSync(path)) {
    log(`Config already exists at ${path}`);
    return;
  }

  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const content = JSON.stringify(DEFAULT_PROMPT_CONFIG, null, 2);

  writeFileSync(path, `${content}\n`);
  log(`Created config at ${path}`);
}
