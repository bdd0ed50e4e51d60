import { type InputAction, inputActionFromKey } from '../actions.js';
import { DEFAULT_PROMPT_CONFIG, type PromptConfig } from '../cli-config.js';
import { applyInputAction, createEditor, type EditorState, getText } from '../editor.js';
import type { Key } from '../input.js';
import { type Prompt, type PromptContext, runPrompt, type Submission } from '../prompt.js';
import type { Renderer } from '../renderer.js';

export interface ConfirmOptions {
  message: string;
  /** Answer used when the input is submitted empty. */
  default?: boolean;
  helpMessage?: string | null;
  /** Returns null for input that is neither yes nor no. */
  parser?: (input: string) => boolean | null;
  formatter?: (answer: boolean) => string;
  errorMessage?: string;
}

export type ConfirmPromptAction = { type: 'valueInput'; action: InputAction };

export const CONFIRM_ERROR_MESSAGE = "Invalid answer, try typing 'y' for yes or 'n' for no";

export function parseConfirmation(input: string): boolean | null {
  switch (input.trim().toLowerCase()) {
    case 'y':
    case 'yes':
      return true;
    case 'n':
    case 'no':
      return false;
    default:
      return null;
  }
}

export function formatConfirmation(answer: boolean): string {
  return answer ? 'Yes' : 'No';
}

/** `Y/n` or `y/N`, capitalising the default. */
export function formatConfirmationDefault(value: boolean): string {
  return value ? 'Y/n' : 'y/N';
}

export class ConfirmPrompt implements Prompt<ConfirmPromptAction, boolean> {
  public readonly message: string;
  private editor: EditorState = createEditor();

  public constructor(
    private readonly options: ConfirmOptions,
    private readonly config: Readonly<PromptConfig> = DEFAULT_PROMPT_CONFIG,
  ) {
    this.message = options.message;
  }

  public mapKey(key: Key): ConfirmPromptAction | null {
    const action = inputActionFromKey(key);
    return action ? { type: 'valueInput', action } : null;
  }

  public apply(action: ConfirmPromptAction): void {
    this.editor = applyInputAction(this.editor, action.action);
  }

  public render(renderer: Renderer): void {
    const defaultValue = this.options.default === undefined ? null : formatConfirmationDefault(this.options.default);
    renderer.printPromptInput(this.message, defaultValue, this.editor);
    const help = this.options.helpMessage ?? null;
    if (help !== null && this.config.showHelp) {
      renderer.printHelp(help);
    }
  }

  public async submit(): Promise<Submission<boolean>> {
    const input = getText(this.editor);
    if (input.trim().length === 0 && this.options.default !== undefined) {
      return { type: 'accepted', answer: this.options.default };
    }
    const answer = (this.options.parser ?? parseConfirmation)(input);
    if (answer === null) {
      return { type: 'rejected', message: this.options.errorMessage ?? CONFIRM_ERROR_MESSAGE };
    }
    return { type: 'accepted', answer };
  }

  public format(answer: boolean): string {
    return (this.options.formatter ?? formatConfirmation)(answer);
  }
}

export async function confirm(options: ConfirmOptions, context: PromptContext = {}): Promise<boolean> {
  return runPrompt(new ConfirmPrompt(options, context.config ?? DEFAULT_PROMPT_CONFIG), context);
}
