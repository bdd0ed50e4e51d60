import { describe, expect, it } from 'vitest';
import { COLORLESS_RENDER_CONFIG, createRenderConfig, DEFAULT_RENDER_CONFIG, renderConfigSchema } from '../src/render-config.js';

describe('createRenderConfig', () => {
  it('fills unset options from the defaults', () => {
    const config = createRenderConfig({ promptPrefix: '>', errorColor: 'magenta' });
    expect(config.promptPrefix).toBe('>');
    expect(config.errorColor).toBe('magenta');
    expect(config.answerColor).toBe(DEFAULT_RENDER_CONFIG.answerColor);
  });

  it('returns the defaults without overrides', () => {
    expect(createRenderConfig()).toEqual(DEFAULT_RENDER_CONFIG);
  });
});

describe('renderConfigSchema', () => {
  it('rejects an unknown color', () => {
    expect(renderConfigSchema.safeParse({ answerColor: 'pink' }).success).toBe(false);
  });
});

describe('COLORLESS_RENDER_CONFIG', () => {
  it('keeps the markers and drops the colors', () => {
    expect(COLORLESS_RENDER_CONFIG.promptPrefix).toBe('?');
    expect(COLORLESS_RENDER_CONFIG.promptPrefixColor).toBeNull();
    expect(COLORLESS_RENDER_CONFIG.errorColor).toBeNull();
    expect(COLORLESS_RENDER_CONFIG.cursorStyle).toBe('inverse');
  });
});
