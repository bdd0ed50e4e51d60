import { z } from 'zod';
import { COLORS, TEXT_STYLES } from './backend.js';

const color = z.enum(COLORS).nullable();
const textStyle = z.enum(TEXT_STYLES).nullable();

/**
 * Colors and markers applied at each renderer call site.
 * `null` means "leave the terminal's own color".
 */
export const renderConfigSchema = z.object({
  promptPrefix: z.string().default('?').describe('Marker printed before every prompt message'),
  promptPrefixColor: color.default('green'),
  answerColor: color.default('cyan').describe('Color of the submitted answer'),
  defaultValueColor: color.default(null),
  canceledIndicator: z.string().default('<canceled>').describe('Printed in place of the answer when a prompt is canceled'),
  canceledIndicatorColor: color.default('darkGrey'),
  errorPrefix: z.string().default('#'),
  errorColor: color.default('red'),
  helpColor: color.default('cyan'),
  selectedOptionColor: color.default('cyan'),
  highlightedOptionPrefix: z.string().default('>'),
  scrollUpPrefix: z.string().default('^'),
  scrollDownPrefix: z.string().default('v'),
  checkedColor: color.default('green'),
  cursorFg: color.default('black'),
  cursorBg: color.default('grey'),
  cursorStyle: textStyle.default(null).describe('Extra emphasis on the text cursor cell, used when colors are off'),
  passwordMask: z.string().default('*'),
  calendarPrefixColor: color.default('green'),
  todayColor: color.default('green'),
  outOfMonthColor: color.default('darkGrey'),
  disabledDateColor: color.default('darkGrey'),
});

export type RenderConfig = z.infer<typeof renderConfigSchema>;

export const DEFAULT_RENDER_CONFIG: Readonly<RenderConfig> = Object.freeze(renderConfigSchema.parse({}));

/** Same markers, no colors; the cursor cell is shown in reverse video instead. */
export const COLORLESS_RENDER_CONFIG: Readonly<RenderConfig> = Object.freeze({
  ...DEFAULT_RENDER_CONFIG,
  promptPrefixColor: null,
  answerColor: null,
  defaultValueColor: null,
  canceledIndicatorColor: null,
  errorColor: null,
  helpColor: null,
  selectedOptionColor: null,
  checkedColor: null,
  cursorFg: null,
  cursorBg: null,
  cursorStyle: 'inverse',
  calendarPrefixColor: null,
  todayColor: null,
  outOfMonthColor: null,
  disabledDateColor: null,
});

/** Fills the options a caller left out from the defaults. */
export function createRenderConfig(overrides: Partial<RenderConfig> = {}): RenderConfig {
  return renderConfigSchema.parse({ ...DEFAULT_RENDER_CONFIG, ...overrides });
}
