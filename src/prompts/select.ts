import { type InputAction, inputActionFromKey, type ListNavigation, listNavigationFromKey } from '../actions.js';
import { DEFAULT_PROMPT_CONFIG, type PromptConfig } from '../cli-config.js';
import { applyInputAction, createEditor, type EditorState, getText } from '../editor.js';
import type { Key } from '../input.js';
import { paginate, wrapCursor } from '../pager.js';
import { type Prompt, type PromptContext, runPrompt, type Submission } from '../prompt.js';
import type { Renderer } from '../renderer.js';
import { assertListConfig, defaultFilter, type Filter, filterIndices, type ListOption } from './list.js';

export interface SelectOptions<T> {
  message: string;
  /** Must not be empty. */
  options: readonly T[];
  helpMessage?: string | null;
  pageSize?: number;
  vimMode?: boolean;
  startingCursor?: number;
  /** Label shown for an option; `String(option)` by default. */
  display?: (option: T) => string;
  filter?: Filter<T>;
  formatter?: (option: ListOption<T>) => string;
}

export type SelectPromptAction = { type: 'filterInput'; action: InputAction } | ListNavigation;

export const SELECT_HELP = '↑↓ to move, enter to select, type to filter';

export function selectActionFromKey(key: Key, vimMode: boolean): SelectPromptAction | null {
  const navigation = listNavigationFromKey(key, vimMode);
  if (navigation) {
    return navigation;
  }
  const action = inputActionFromKey(key);
  return action ? { type: 'filterInput', action } : null;
}

export class SelectPrompt<T> implements Prompt<SelectPromptAction, ListOption<T>> {
  public readonly message: string;
  private readonly labels: string[];
  private readonly pageSize: number;
  private readonly vimMode: boolean;
  private filterEditor: EditorState = createEditor();
  /** Indices into `options` that pass the filter, in list order. */
  private filtered: number[];
  /** Index into `filtered`. */
  private cursor: number;

  public constructor(
    private readonly options: SelectOptions<T>,
    private readonly config: Readonly<PromptConfig> = DEFAULT_PROMPT_CONFIG,
  ) {
    this.message = options.message;
    this.pageSize = options.pageSize ?? config.pageSize;
    this.vimMode = options.vimMode ?? config.vimMode;
    this.cursor = options.startingCursor ?? 0;
    assertListConfig(options.options.length, this.pageSize, this.cursor);
    const display = options.display ?? String;
    this.labels = options.options.map((o) => display(o));
    this.filtered = options.options.map((_, i) => i);
  }

  /** The option under the cursor, if any option passes the filter. */
  public get highlighted(): ListOption<T> | null {
    const index = this.filtered[this.cursor];
    return index === undefined ? null : { index, value: this.options.options[index] };
  }

  public mapKey(key: Key): SelectPromptAction | null {
    return selectActionFromKey(key, this.vimMode);
  }

  public apply(action: SelectPromptAction): void {
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
    }
  }

  public render(renderer: Renderer): void {
    renderer.printPrompt(this.message, null, getText(this.filterEditor));
    const page = paginate(
      this.filtered.map((i) => this.labels[i]),
      this.pageSize,
      this.cursor,
    );
    renderer.printOptions(page);
    const help = this.options.helpMessage !== undefined ? this.options.helpMessage : SELECT_HELP;
    if (help !== null && this.config.showHelp) {
      renderer.printHelp(help);
    }
  }

  public async submit(): Promise<Submission<ListOption<T>>> {
    const answer = this.highlighted;
    return answer ? { type: 'accepted', answer } : { type: 'ignored' };
  }

  public format(answer: ListOption<T>): string {
    return this.options.formatter ? this.options.formatter(answer) : this.labels[answer.index];
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

export async function select<T>(options: SelectOptions<T>, context: PromptContext = {}): Promise<ListOption<T>> {
  return runPrompt(new SelectPrompt(options, context.config ?? DEFAULT_PROMPT_CONFIG), context);
}
