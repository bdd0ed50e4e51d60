import { type InputAction, inputActionFromKey } from '../actions.js';
import { DEFAULT_PROMPT_CONFIG, type PromptConfig } from '../cli-config.js';
import { applyInputAction, createEditor, type EditorState, getText } from '../editor.js';
import { InvalidConfigurationError } from '../errors.js';
import { hasModifiers, type Key } from '../input.js';
import { paginate, wrapCursor } from '../pager.js';
import { type PromptContext, type Prompt, runPrompt, type Submission } from '../prompt.js';
import type { Renderer } from '../renderer.js';
import { runValidators, type Validator } from '../validator.js';

export interface TextOptions {
  message: string;
  /** Shown next to the message and used when the input is left empty. */
  default?: string;
  /** Pre-fills the input. */
  initialValue?: string;
  helpMessage?: string | null;
  validators?: readonly Validator<string>[];
  formatter?: (answer: string) => string;
  /** Suggestions for the current input, shown as a list below the prompt. */
  suggester?: (input: string) => readonly string[];
  pageSize?: number;
}

export type TextPromptAction =
  | { type: 'valueInput'; action: InputAction }
  | { type: 'suggestionUp' }
  | { type: 'suggestionDown' }
  | { type: 'suggestionPageUp' }
  | { type: 'suggestionPageDown' }
  | { type: 'useSuggestion' };

const SUGGESTION_HELP = '↑↓ to move, tab to autocomplete, enter to submit';

/**
 * Navigation keys are taken before the text field sees them, so arrows
 * browse suggestions while everything else edits the value.
 */
export function textActionFromKey(key: Key): TextPromptAction | null {
  if (!hasModifiers(key)) {
    switch (key.type) {
      case 'up':
        return { type: 'suggestionUp' };
      case 'down':
        return { type: 'suggestionDown' };
      case 'pageup':
        return { type: 'suggestionPageUp' };
      case 'pagedown':
        return { type: 'suggestionPageDown' };
      case 'tab':
        return { type: 'useSuggestion' };
    }
  }
  const action = inputActionFromKey(key);
  return action ? { type: 'valueInput', action } : null;
}

export class TextPrompt implements Prompt<TextPromptAction, string> {
  public readonly message: string;
  private editor: EditorState;
  private suggestions: readonly string[] = [];
  /** Index into `suggestions`; null while nothing is highlighted. */
  private suggestionCursor: number | null = null;
  private readonly pageSize: number;

  public constructor(
    private readonly options: TextOptions,
    private readonly config: Readonly<PromptConfig> = DEFAULT_PROMPT_CONFIG,
  ) {
    this.message = options.message;
    this.pageSize = options.pageSize ?? config.pageSize;
    if (!Number.isInteger(this.pageSize) || this.pageSize < 1) {
      throw new InvalidConfigurationError(`page size must be a positive integer, got ${this.pageSize}`);
    }
    this.editor = createEditor(options.initialValue ?? '');
    this.refreshSuggestions();
  }

  public get value(): string {
    return getText(this.editor);
  }

  public mapKey(key: Key): TextPromptAction | null {
    return textActionFromKey(key);
  }

  public apply(action: TextPromptAction): void {
    switch (action.type) {
      case 'valueInput': {
        const next = applyInputAction(this.editor, action.action);
        const changed = getText(next) !== getText(this.editor);
        this.editor = next;
        if (changed) {
          this.refreshSuggestions();
        }
        break;
      }
      case 'suggestionUp':
        this.moveSuggestion(-1);
        break;
      case 'suggestionDown':
        this.moveSuggestion(1);
        break;
      case 'suggestionPageUp':
        this.moveSuggestion(-this.pageSize, false);
        break;
      case 'suggestionPageDown':
        this.moveSuggestion(this.pageSize, false);
        break;
      case 'useSuggestion': {
        const suggestion = this.highlightedSuggestion();
        if (suggestion !== null) {
          this.editor = createEditor(suggestion);
          this.refreshSuggestions();
        }
        break;
      }
    }
  }

  public render(renderer: Renderer): void {
    renderer.printPromptInput(this.message, this.options.default ?? null, this.editor);
    if (this.suggestions.length > 0) {
      const page = paginate(this.suggestions, this.pageSize, this.suggestionCursor ?? 0);
      renderer.printOptions(page, this.suggestionCursor !== null);
    }
    const help = this.helpMessage();
    if (help !== null && this.config.showHelp) {
      renderer.printHelp(help);
    }
  }

  public async submit(): Promise<Submission<string>> {
    let answer = this.highlightedSuggestion() ?? getText(this.editor);
    if (answer.length === 0 && this.options.default !== undefined) {
      answer = this.options.default;
    }
    const validation = await runValidators(this.options.validators ?? [], answer);
    if (validation.type === 'invalid') {
      return { type: 'rejected', message: validation.message };
    }
    return { type: 'accepted', answer };
  }

  public format(answer: string): string {
    return this.options.formatter ? this.options.formatter(answer) : answer;
  }

  private helpMessage(): string | null {
    if (this.options.helpMessage !== undefined) {
      return this.options.helpMessage;
    }
    return this.suggestions.length > 0 ? SUGGESTION_HELP : null;
  }

  private highlightedSuggestion(): string | null {
    return this.suggestionCursor === null ? null : (this.suggestions[this.suggestionCursor] ?? null);
  }

  private refreshSuggestions(): void {
    this.suggestions = this.options.suggester ? this.options.suggester(getText(this.editor)) : [];
    this.suggestionCursor = null;
  }

  private moveSuggestion(delta: number, wrap = true): void {
    const count = this.suggestions.length;
    if (count === 0) {
      return;
    }
    if (this.suggestionCursor === null) {
      this.suggestionCursor = delta > 0 ? 0 : count - 1;
      return;
    }
    this.suggestionCursor = wrap ? wrapCursor(this.suggestionCursor, delta, count) : Math.min(count - 1, Math.max(0, this.suggestionCursor + delta));
  }
}

export async function text(options: TextOptions, context: PromptContext = {}): Promise<string> {
  return runPrompt(new TextPrompt(options, context.config ?? DEFAULT_PROMPT_CONFIG), context);
}
