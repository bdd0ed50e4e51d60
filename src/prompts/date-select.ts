import { DayOfWeek, LocalDate, YearMonth } from '@js-joda/core';
import { DEFAULT_PROMPT_CONFIG, type PromptConfig } from '../cli-config.js';
import { InvalidConfigurationError } from '../errors.js';
import { hasModifiers, type Key } from '../input.js';
import { type Prompt, type PromptContext, runPrompt, type Submission } from '../prompt.js';
import type { Renderer } from '../renderer.js';
import { runValidators, type Validator } from '../validator.js';

export interface DateSelectOptions {
  message: string;
  /** Defaults to today, clamped into the allowed range. */
  startingDate?: LocalDate;
  minDate?: LocalDate;
  maxDate?: LocalDate;
  weekStart?: DayOfWeek;
  helpMessage?: string | null;
  vimMode?: boolean;
  validators?: readonly Validator<LocalDate>[];
  formatter?: (date: LocalDate) => string;
  /** Which day is highlighted as today. */
  today?: LocalDate;
}

export type DateSelectPromptAction =
  | { type: 'previousDay' }
  | { type: 'nextDay' }
  | { type: 'previousWeek' }
  | { type: 'nextWeek' }
  | { type: 'previousMonth' }
  | { type: 'nextMonth' }
  | { type: 'previousYear' }
  | { type: 'nextYear' };

export const DATE_SELECT_HELP = 'arrows to move, [ and ] to change months, { and } to change years, enter to select';

/** Arrows move by day and week, with h/l and k/j doing the same in vim mode. */
export function dateSelectActionFromKey(key: Key, vimMode: boolean): DateSelectPromptAction | null {
  if (hasModifiers(key)) {
    return null;
  }
  switch (key.type) {
    case 'left':
      return { type: 'previousDay' };
    case 'right':
      return { type: 'nextDay' };
    case 'up':
      return { type: 'previousWeek' };
    case 'down':
      return { type: 'nextWeek' };
    case 'pageup':
      return { type: 'previousMonth' };
    case 'pagedown':
      return { type: 'nextMonth' };
    case 'char':
      break;
    default:
      return null;
  }
  switch (key.value) {
    case '[':
      return { type: 'previousMonth' };
    case ']':
      return { type: 'nextMonth' };
    case '{':
      return { type: 'previousYear' };
    case '}':
      return { type: 'nextYear' };
  }
  if (!vimMode) {
    return null;
  }
  switch (key.value) {
    case 'h':
      return { type: 'previousDay' };
    case 'l':
      return { type: 'nextDay' };
    case 'k':
      return { type: 'previousWeek' };
    case 'j':
      return { type: 'nextWeek' };
    default:
      return null;
  }
}

const titleCase = (name: string) => name.charAt(0) + name.slice(1).toLowerCase();

/** e.g. "Thursday, August 5, 2021" */
export function formatDate(date: LocalDate): string {
  return `${titleCase(date.dayOfWeek().name())}, ${titleCase(date.month().name())} ${date.dayOfMonth()}, ${date.year()}`;
}

export class DateSelectPrompt implements Prompt<DateSelectPromptAction, LocalDate> {
  public readonly message: string;
  private readonly min: LocalDate | null;
  private readonly max: LocalDate | null;
  private readonly today: LocalDate;
  private readonly vimMode: boolean;
  private current: LocalDate;

  public constructor(
    private readonly options: DateSelectOptions,
    private readonly config: Readonly<PromptConfig> = DEFAULT_PROMPT_CONFIG,
  ) {
    this.message = options.message;
    this.min = options.minDate ?? null;
    this.max = options.maxDate ?? null;
    this.today = options.today ?? LocalDate.now();
    this.vimMode = options.vimMode ?? config.vimMode;
    if (this.min && this.max && this.min.isAfter(this.max)) {
      throw new InvalidConfigurationError(`minimum date ${this.min} is after maximum date ${this.max}`);
    }
    const start = options.startingDate;
    if (start && !this.inRange(start)) {
      throw new InvalidConfigurationError(`starting date ${start} is outside the allowed range`);
    }
    this.current = start ?? this.clamp(this.today);
  }

  public get selected(): LocalDate {
    return this.current;
  }

  public mapKey(key: Key): DateSelectPromptAction | null {
    return dateSelectActionFromKey(key, this.vimMode);
  }

  public apply(action: DateSelectPromptAction): void {
    const date = this.current;
    switch (action.type) {
      case 'previousDay':
        this.current = this.clamp(date.minusDays(1));
        break;
      case 'nextDay':
        this.current = this.clamp(date.plusDays(1));
        break;
      case 'previousWeek':
        this.current = this.clamp(date.minusWeeks(1));
        break;
      case 'nextWeek':
        this.current = this.clamp(date.plusWeeks(1));
        break;
      case 'previousMonth':
        this.current = this.clamp(date.minusMonths(1));
        break;
      case 'nextMonth':
        this.current = this.clamp(date.plusMonths(1));
        break;
      case 'previousYear':
        this.current = this.clamp(date.minusYears(1));
        break;
      case 'nextYear':
        this.current = this.clamp(date.plusYears(1));
        break;
    }
  }

  public render(renderer: Renderer): void {
    renderer.printPrompt(this.message);
    renderer.printCalendarMonth({
      month: YearMonth.from(this.current),
      weekStart: this.options.weekStart ?? DayOfWeek.SUNDAY,
      today: this.today,
      selected: this.current,
      min: this.min,
      max: this.max,
    });
    const help = this.options.helpMessage !== undefined ? this.options.helpMessage : DATE_SELECT_HELP;
    if (help !== null && this.config.showHelp) {
      renderer.printHelp(help);
    }
  }

  public async submit(): Promise<Submission<LocalDate>> {
    const validation = await runValidators(this.options.validators ?? [], this.current);
    if (validation.type === 'invalid') {
      return { type: 'rejected', message: validation.message };
    }
    return { type: 'accepted', answer: this.current };
  }

  public format(answer: LocalDate): string {
    return (this.options.formatter ?? formatDate)(answer);
  }

  private inRange(date: LocalDate): boolean {
    return !(this.min && date.isBefore(this.min)) && !(this.max && date.isAfter(this.max));
  }

  private clamp(date: LocalDate): LocalDate {
    if (this.min && date.isBefore(this.min)) {
      return this.min;
    }
    if (this.max && date.isAfter(this.max)) {
      return this.max;
    }
    return date;
  }
}

export async function dateSelect(options: DateSelectOptions, context: PromptContext = {}): Promise<LocalDate> {
  return runPrompt(new DateSelectPrompt(options, context.config ?? DEFAULT_PROMPT_CONFIG), context);
}
