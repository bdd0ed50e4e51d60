/**
 * Line-count terminal renderer for prompts.
 * Redraws only the lines the prompt owns, never the whole screen.
 *
 * `curLine` is the number of screen rows the current frame occupies. Every
 * newline written is counted, including ones inside token content, and a line
 * longer than the terminal counts once per row it wraps onto. `resetPrompt`
 * clears exactly that many rows, so a redraw never leaves stale lines behind
 * and never erases output the prompt does not own.
 */

import type { DayOfWeek, LocalDate, YearMonth } from '@js-joda/core';
import type { Backend, Color, TextStyle } from './backend.js';
import { type EditorState, masked, split } from './editor.js';
import type { Key } from './input.js';
import type { Page } from './pager.js';
import type { RenderConfig } from './render-config.js';

export interface Token {
  content: string;
  fg?: Color | null;
  bg?: Color | null;
  style?: TextStyle | null;
}

export interface MultiOptionLine {
  label: string;
  checked: boolean;
}

export interface CalendarView {
  month: YearMonth;
  weekStart: DayOfWeek;
  today: LocalDate;
  selected: LocalDate;
  min: LocalDate | null;
  max: LocalDate | null;
}

const CALENDAR_HEADER_WIDTH = 20;
const CALENDAR_WEEKS = 6;

function center(text: string, width: number): string {
  const pad = Math.max(0, width - [...text].length);
  const left = Math.floor(pad / 2);
  return ' '.repeat(left) + text + ' '.repeat(pad - left);
}

export function printToken(backend: Backend, token: Token): void {
  if (token.content.length === 0) {
    return;
  }
  if (token.fg) {
    backend.setForeground(token.fg);
  }
  if (token.bg) {
    backend.setBackground(token.bg);
  }
  if (token.style) {
    backend.setStyle(token.style);
  }
  backend.write(token.content);
  if (token.fg) {
    backend.resetForeground();
  }
  if (token.bg) {
    backend.resetBackground();
  }
  if (token.style) {
    backend.resetStyle(token.style);
  }
}

export class Renderer {
  private curLine = 0;
  /** Cells written on the current line so far. */
  private column = 0;

  public constructor(
    private readonly backend: Backend,
    private readonly config: Readonly<RenderConfig>,
  ) {
    this.backend.cursorHide();
  }

  /** Lines occupied by the frame drawn since the last reset. */
  public get lineCount(): number {
    return this.curLine;
  }

  public resetPrompt(): void {
    for (let i = 0; i < this.curLine; i++) {
      this.backend.cursorUp();
      this.backend.cursorHorizontalReset();
      this.backend.clearLine();
    }
    this.curLine = 0;
    this.column = 0;
  }

  /** Writes tokens on the current line; a newline inside a token ends the line. */
  public printTokens(tokens: readonly Token[]): void {
    for (const t of tokens) {
      t.content.split('\n').forEach((segment, idx) => {
        if (idx > 0) {
          this.newLine();
        }
        printToken(this.backend, { ...t, content: segment });
        this.column += [...segment].length;
      });
    }
  }

  public printLine(tokens: readonly Token[]): void {
    this.printTokens(tokens);
    this.newLine();
  }

  public printErrorMessage(message: string): void {
    this.printLine([{ content: `${this.config.errorPrefix} ${message}`, fg: this.config.errorColor }]);
  }

  public printHelp(message: string): void {
    this.printLine([{ content: `[${message}]`, fg: this.config.helpColor }]);
  }

  public printPrompt(prompt: string, defaultValue: string | null = null, content: string | null = null): void {
    const tokens = this.promptTokens(prompt, defaultValue);
    if (content) {
      tokens.push({ content: ` ${content}`, style: 'bold' });
    }
    this.printLine(tokens);
  }

  /** Prompt line with an editable value; the cell under the cursor is highlighted. */
  public printPromptInput(prompt: string, defaultValue: string | null, editor: EditorState): void {
    const { before, at, after } = split(editor);
    this.printLine([
      ...this.promptTokens(prompt, defaultValue),
      { content: ' ' },
      { content: before },
      { content: at, fg: this.config.cursorFg, bg: this.config.cursorBg, style: this.config.cursorStyle },
      { content: after },
    ]);
  }

  public printMaskedInput(prompt: string, editor: EditorState): void {
    this.printPromptInput(prompt, null, masked(editor, this.config.passwordMask));
  }

  public printPromptAnswer(prompt: string, answer: string): void {
    this.printLine([...this.promptTokens(prompt, null), { content: ` ${answer}`, fg: this.config.answerColor }]);
  }

  public printOption(cursor: boolean, content: string): void {
    if (cursor) {
      this.printLine([{ content: `${this.config.highlightedOptionPrefix} ${content}`, fg: this.config.selectedOptionColor }]);
    } else {
      this.printLine([{ content: `  ${content}` }]);
    }
  }

  /**
   * One line per visible option. Rows at a window edge that is not the end of
   * the list get a scroll marker, unless they hold the highlighted option.
   */
  public printOptions(page: Page<string>, highlight = true): void {
    page.content.forEach((option, idx) => {
      if (highlight && idx === page.selection) {
        this.printOption(true, option);
        return;
      }
      this.printLine([{ content: `${this.edgeMarker(page, idx)} ${option}` }]);
    });
  }

  public printMultiOption(cursor: boolean, checked: boolean, content: string, marker = ' '): void {
    this.printLine([
      cursor ? { content: `${this.config.highlightedOptionPrefix} `, fg: this.config.selectedOptionColor } : { content: `${marker} ` },
      checked ? { content: '[x] ', fg: this.config.checkedColor } : { content: '[ ] ' },
      { content },
    ]);
  }

  public printMultiOptions(page: Page<MultiOptionLine>): void {
    page.content.forEach((option, idx) => {
      const cursor = idx === page.selection;
      this.printMultiOption(cursor, option.checked, option.label, this.edgeMarker(page, idx));
    });
  }

  /** Month header, weekday header and six week rows: eight lines. */
  public printCalendarMonth(view: CalendarView): void {
    const prefix: Token = { content: '> ', fg: this.config.calendarPrefixColor };
    const header = `${view.month.month().name().toLowerCase()} ${view.month.year()}`;
    this.printLine([prefix, { content: center(header, CALENDAR_HEADER_WIDTH) }]);

    const weekDays: string[] = [];
    let weekday = view.weekStart;
    for (let i = 0; i < 7; i++) {
      weekDays.push(weekday.name().slice(0, 2).toLowerCase());
      weekday = weekday.plus(1);
    }
    this.printLine([prefix, { content: weekDays.join(' ') }]);

    // the first row always starts before the 1st, a whole week before when the 1st falls on weekStart
    let date = view.month.atDay(1).minusDays(1);
    while (!date.dayOfWeek().equals(view.weekStart)) {
      date = date.minusDays(1);
    }

    for (let week = 0; week < CALENDAR_WEEKS; week++) {
      const tokens: Token[] = [prefix];
      for (let i = 0; i < 7; i++) {
        if (i > 0) {
          tokens.push({ content: ' ' });
        }
        tokens.push(this.dateToken(date, view));
        date = date.plusDays(1);
      }
      this.printLine(tokens);
    }
  }

  public cleanup(message: string, answer: string): void {
    this.resetPrompt();
    this.printPromptAnswer(message, answer);
  }

  public cleanupCanceled(message: string): void {
    this.resetPrompt();
    this.printLine([...this.promptTokens(message, null), { content: ` ${this.config.canceledIndicator}`, fg: this.config.canceledIndicatorColor }]);
  }

  public flush(): void {
    this.backend.flush();
  }

  public readKey(): Promise<Key | null> {
    return this.backend.readKey();
  }

  /** Gives the terminal cursor back. Call on every exit path. */
  public dispose(): void {
    this.backend.cursorShow();
    this.backend.flush();
  }

  private promptTokens(prompt: string, defaultValue: string | null): Token[] {
    const tokens: Token[] = [{ content: `${this.config.promptPrefix} `, fg: this.config.promptPrefixColor }, { content: prompt }];
    if (defaultValue !== null) {
      tokens.push({ content: ` (${defaultValue})`, fg: this.config.defaultValueColor });
    }
    return tokens;
  }

  private edgeMarker(page: Page<unknown>, idx: number): string {
    if (idx === 0 && !page.first) {
      return this.config.scrollUpPrefix;
    }
    if (idx === page.content.length - 1 && !page.last) {
      return this.config.scrollDownPrefix;
    }
    return ' ';
  }

  private dateToken(date: LocalDate, view: CalendarView): Token {
    const content = String(date.dayOfMonth()).padStart(2, ' ');
    if (date.equals(view.selected)) {
      return { content, fg: this.config.cursorFg, bg: this.config.cursorBg, style: this.config.cursorStyle };
    }
    if ((view.min && date.isBefore(view.min)) || (view.max && date.isAfter(view.max))) {
      return { content, fg: this.config.disabledDateColor };
    }
    if (date.equals(view.today)) {
      return { content, fg: this.config.todayColor };
    }
    if (date.monthValue() !== view.month.monthValue()) {
      return { content, fg: this.config.outOfMonthColor };
    }
    return { content };
  }

  private newLine(): void {
    this.backend.cursorHorizontalReset();
    this.backend.write('\n');
    this.curLine += Math.max(1, Math.ceil(this.column / Math.max(1, this.backend.columns())));
    this.column = 0;
  }
}
