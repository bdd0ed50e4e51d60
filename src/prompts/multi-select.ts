import { type InputAction, inputActionFromKey, type ListNavigation, listNavigationFromKey } from '../actions.js';
import { DEFAULT_PROMPT_CONFIG, type PromptConfig } from '../cli-config.js';
import { applyInputAction, createEditor, type EditorState, getText } from '../editor.js';
import { InvalidConfigurationError } from '../errors.js';
import { hasModifiers, type Key } from '../input.js';
import { paginate, wrapCursor } from '../pager.js';
import { type Prompt, type PromptContext, runPrompt, type Submission } from '../prompt.js';
import type { Renderer } from '../renderer.js';
import { runValidators, type Validator } from '../validator.js';
import { assertListConfig, defaultFilter, type Filter, filterIndices, type ListOption } from './list.js';

export interface MultiSelectOptions<T> {
  message: string;
  /** Must not be empty. */
  options: readonly T[];
  /** Indices checked when the prompt opens. */
  defaultSelections?: readonly number[];
  helpMessage?: string | null;
  pageSize?: number;
  vimMode?: boolean;
  startingCursor?: number;
  /** Keep the filter text after toggling an option. Default true. */
  keepFilter?: boolean;
  display?: (option: T) => string;
  filter?: Filter<T>;
  validators?: readonly Validator<readonly ListOption<T>[]>[];
  formatter?: (answer: readonly ListOption<T>[]) => string;
}

export type MultiSelectPromptAction = { type: 'filterInput'; action: InputAction } | ListNavigation | { type: 'toggleSelection' } | { type: 'selectAll' } | { type: 'clearSelections' };

export const MULTI_SELECT_HELP = '↑↓ to move, space to select one, → to all, ← to none, type to filter';

/** Space toggles, → checks every visible option and ← unchecks them (l and h in vim mode). */
export function multiSelectActionFromKey(key: Key, vimMode: boolean): MultiSelectPromptAction | null {
  const navigation = listNavigationFromKey(key, vimMode);
  if (navigation) {
    return navigation;
  }
  if (!hasModifiers(key)) {
    if (key.type === 'right' || (vimMode && key.type === 'char' && key.value === 'l')) {
      return { type: 'selectAll' };
    }
    if (key.type === 'left' || (vimMode && key.type === 'char' && key.value === 'h')) {
      return { type: 'clearSelections' };
    }
    if (key.type === 'char' && key.value === ' ') {
      return { type: 'toggleSelection' };
    }
  }
  const action = inputActionFromKey(key);
  return action ? { type: 'filterInput', action } : null;
}

export class MultiSelectPrompt<T> implements Prompt<MultiSelectPromptAction, ListOption<T>[]> {
  public readonly message: string;
  private readonly labels: string[];
  private readonly pageSize: number;
  private readonly vimMode: boolean;
  private readonly checked: Set<number>;
  private filterEditor: EditorState = createEditor();
  private filtered: number[];
  private cursor: number;

  public constructor(
    private readonly options: MultiSelectOptions<T>,
    private readonly config: Readonly<PromptConfig> = DEFAULT_PROMPT_CONFIG,
  ) {
    this.message = options.message;
    this.pageSize = options.pageSize ?? config.pageSize;
    this.vimMode = options.vimMode ?? config.vimMode;
    this.cursor = options.startingCursor ?? 0;
    assertListConfig(options.options.length, this.pageSize, this.cursor);
    for (const i of options.defaultSelections ?? []) {
      if (!Number.isInteger(i) || i < 0 || i >= options.options.length) {
        throw new InvalidConfigurationError(`default selection ${i} is out of range for ${options.options.length} options`);
      }
    }
    this.checked = new Set(options.defaultSelections ?? []);
    const display = options.display ?? String;
    this.labels = options.options.map((o) => display(o));
    this.filtered = options.options.map((_, i) => i);
  }

  /** Checked options in list order. */
  public get selected(): ListOption<T>[] {
    return [...this.checked].sort((a, b) => a - b).map((index) => ({ index, value: this.options.options[index] }));
  }

  public mapKey(key: Key): MultiSelectPromptAction | null {
    return multiSelectActionFromKey(key, this.vimMode);
  }

  public apply(action: MultiSelectPromptAction): void {
    const count = this.filtered.length;
    switch (action.type) {
      case 'filterInput':
        this.updateFilter(applyInputAction(this.filterEditor, action.action));
        break;
      case 'moveUp':
        this.cursor = wrapCursor(this.cursor, -1, count);
        break;
      case 'moveDown':
        this.cursor = wrapCursor(this.cursor, 1, count);
        break;
      case 'pageUp':
        this.cursor = Math.max(0, this.cursor - this.pageSize);
        break;
      case 'pageDown':
        this.cursor = Math.max(0, Math.min(count - 1, this.cursor + this.pageSize));
        break;
      case 'moveToFirst':
        this.cursor = 0;
        break;
      case 'moveToLast':
        this.cursor = Math.max(0, count - 1);
        break;
      case 'toggleSelection': {
        const index = this.filtered[this.cursor];
        if (index === undefined) {
          break;
        }
        if (this.checked.has(index)) {
          this.checked.delete(index);
        } else {
          this.checked.add(index);
        }
        if (!(this.options.keepFilter ?? true)) {
          this.updateFilter(createEditor());
        }
        break;
      }
      case 'selectAll':
        for (const i of this.filtered) {
          this.checked.add(i);
        }
        break;
      case 'clearSelections':
        for (const i of this.filtered) {
          this.checked.delete(i);
        }
        break;
    }
  }

  public render(renderer: Renderer): void {
    renderer.printPrompt(this.message, null, getText(this.filterEditor));
    const page = paginate(
      this.filtered.map((i) => ({ label: this.labels[i], checked: this.checked.has(i) })),
      this.pageSize,
      this.cursor,
    );
    renderer.printMultiOptions(page);
    const help = this.options.helpMessage !== undefined ? this.options.helpMessage : MULTI_SELECT_HELP;
    if (help !== null && this.config.showHelp) {
      renderer.printHelp(help);
    }
  }

  public async submit(): Promise<Submission<ListOption<T>[]>> {
    const answer = this.selected;
    const validation = await runValidators(this.options.validators ?? [], answer);
    if (validation.type === 'invalid') {
      return { type: 'rejected', message: validation.message };
    }
    return { type: 'accepted', answer };
  }

  public format(answer: ListOption<T>[]): string {
    return this.options.formatter ? this.options.formatter(answer) : answer.map((o) => this.labels[o.index]).join(', ');
  }

  private updateFilter(next: EditorState): void {
    const changed = getText(next) !== getText(this.filterEditor);
    this.filterEditor = next;
    if (!changed) {
      return;
    }
    const previous = this.filtered[this.cursor];
    this.filtered = filterIndices(this.options.options, this.labels, getText(next), this.options.filter ?? defaultFilter);
    const kept = previous === undefined ? -1 : this.filtered.indexOf(previous);
    this.cursor = kept === -1 ? 0 : kept;
  }
}

export async function multiSelect<T>(options: MultiSelectOptions<T>, context: PromptContext = {}): Promise<ListOption<T>[]> {
  return runPrompt(new MultiSelectPrompt(options, context.config ?? DEFAULT_PROMPT_CONFIG), context);
}
