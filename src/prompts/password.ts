import { type InputAction, inputActionFromKey } from '../actions.js';
import { DEFAULT_PROMPT_CONFIG, type PromptConfig } from '../cli-config.js';
import { applyInputAction, clear, createEditor, type EditorState, getText } from '../editor.js';
import type { Key } from '../input.js';
import { type Confirmation, type Prompt, type PromptContext, runPrompt, type Submission } from '../prompt.js';
import type { Renderer } from '../renderer.js';
import { runValidators, type Validator } from '../validator.js';

/**
 * - hidden: nothing of the value is shown
 * - masked: one mask character per character typed
 * - full: the value as typed
 */
export type PasswordDisplayMode = 'hidden' | 'masked' | 'full';

export interface PasswordOptions {
  message: string;
  /** Ask for the value a second time; a different second entry fails the prompt. Default true. */
  confirmation?: boolean;
  confirmationMessage?: string;
  displayMode?: PasswordDisplayMode;
  /** Let Ctrl+R switch between the display mode and full text. */
  displayToggle?: boolean;
  helpMessage?: string | null;
  validators?: readonly Validator<string>[];
  formatter?: (answer: string) => string;
}

export type PasswordPromptAction = { type: 'valueInput'; action: InputAction } | { type: 'toggleDisplayMode' };

export const DEFAULT_CONFIRMATION_MESSAGE = 'Confirmation:';

const DEFAULT_FORMATTER = () => '********';

export function passwordActionFromKey(key: Key, displayToggle: boolean): PasswordPromptAction | null {
  if (displayToggle && key.type === 'char' && key.ctrl && key.value === 'r') {
    return { type: 'toggleDisplayMode' };
  }
  const action = inputActionFromKey(key);
  return action ? { type: 'valueInput', action } : null;
}

export class PasswordPrompt implements Prompt<PasswordPromptAction, string> {
  public readonly message: string;
  public readonly confirmation?: Confirmation<string>;
  private editor: EditorState = createEditor();
  private revealed = false;
  private confirming = false;
  private readonly displayMode: PasswordDisplayMode;

  public constructor(
    private readonly options: PasswordOptions,
    private readonly config: Readonly<PromptConfig> = DEFAULT_PROMPT_CONFIG,
  ) {
    this.message = options.message;
    this.displayMode = options.displayMode ?? 'hidden';
    if (options.confirmation ?? true) {
      this.confirmation = {
        enter: () => {
          this.editor = clear(this.editor);
          this.confirming = true;
        },
        matches: (first) => getText(this.editor) === first,
      };
    }
  }

  public get value(): string {
    return getText(this.editor);
  }

  public mapKey(key: Key): PasswordPromptAction | null {
    return passwordActionFromKey(key, this.options.displayToggle ?? false);
  }

  public apply(action: PasswordPromptAction): void {
    switch (action.type) {
      case 'valueInput':
        this.editor = applyInputAction(this.editor, action.action);
        break;
      case 'toggleDisplayMode':
        this.revealed = !this.revealed;
        break;
    }
  }

  public render(renderer: Renderer): void {
    const label = this.confirming ? (this.options.confirmationMessage ?? DEFAULT_CONFIRMATION_MESSAGE) : this.message;
    const mode = this.revealed ? 'full' : this.displayMode;
    switch (mode) {
      case 'hidden':
        renderer.printPrompt(label);
        break;
      case 'masked':
        renderer.printMaskedInput(label, this.editor);
        break;
      case 'full':
        renderer.printPromptInput(label, null, this.editor);
        break;
    }
    const help = this.options.helpMessage !== undefined ? this.options.helpMessage : this.options.displayToggle ? 'ctrl+r to reveal/hide' : null;
    if (help !== null && this.config.showHelp) {
      renderer.printHelp(help);
    }
  }

  public async submit(): Promise<Submission<string>> {
    const answer = getText(this.editor);
    const validation = await runValidators(this.options.validators ?? [], answer);
    if (validation.type === 'invalid') {
      return { type: 'rejected', message: validation.message };
    }
    return { type: 'accepted', answer };
  }

  public format(answer: string): string {
    return (this.options.formatter ?? DEFAULT_FORMATTER)(answer);
  }
}

export async function password(options: PasswordOptions, context: PromptContext = {}): Promise<string> {
  return runPrompt(new PasswordPrompt(options, context.config ?? DEFAULT_PROMPT_CONFIG), context);
}
