/**
 * The control loop every prompt type runs: render, read one key, map it,
 * apply it, and on submit validate. A rejected submission keeps the prompt's
 * state exactly as it was and shows the message above the prompt.
 */

import { promptActionFromKey } from './actions.js';
import type { Backend } from './backend.js';
import { DEFAULT_PROMPT_CONFIG, type PromptConfig, resolveRenderConfig } from './cli-config.js';
import { ConfirmationMismatchError, EndOfInputError, OperationCanceledError, OperationInterruptedError } from './errors.js';
import type { Key } from './input.js';
import { type DebugLog, disabledLog } from './logger.js';
import type { RenderConfig } from './render-config.js';
import { Renderer } from './renderer.js';
import { createTerminalBackend } from './terminal.js';

export type Submission<T> = { type: 'accepted'; answer: T } | { type: 'rejected'; message: string } | { type: 'ignored' };

/**
 * Second entry stage for prompts that ask for the value twice.
 */
export interface Confirmation<T> {
  /** Empties the value and switches the prompt to its confirmation label. */
  enter(): void;
  /** Whether the value typed during confirmation equals the first answer. */
  matches(first: T): boolean;
}

export interface Prompt<TAction, TAnswer> {
  readonly message: string;
  /** Null when this prompt ignores the key. */
  mapKey(key: Key): TAction | null;
  apply(action: TAction): void;
  render(renderer: Renderer): void;
  submit(): Promise<Submission<TAnswer>>;
  /** Called once, on the accepted answer, for the permanent answer line. */
  format(answer: TAnswer): string;
  readonly confirmation?: Confirmation<TAnswer>;
}

export interface PromptContext {
  /** Defaults to the process's own terminal, released when the prompt ends. */
  backend?: Backend;
  config?: Readonly<PromptConfig>;
  renderConfig?: Readonly<RenderConfig>;
  log?: DebugLog;
}

type Stage<T> = { type: 'editing' } | { type: 'confirming'; first: T };

export async function drivePrompt<TAction, TAnswer>(prompt: Prompt<TAction, TAnswer>, backend: Backend, renderConfig: Readonly<RenderConfig>, log: DebugLog = disabledLog): Promise<TAnswer> {
  const renderer = new Renderer(backend, renderConfig);
  let stage: Stage<TAnswer> = { type: 'editing' };
  let error: string | null = null;

  try {
    for (;;) {
      renderer.resetPrompt();
      if (error !== null) {
        renderer.printErrorMessage(error);
      }
      prompt.render(renderer);
      renderer.flush();

      const key = await renderer.readKey();
      if (key === null) {
        log.log('end of input');
        throw new EndOfInputError();
      }

      const action = promptActionFromKey(key, (k) => prompt.mapKey(k));
      log.log('key', key, action);
      if (action === null) {
        continue;
      }

      switch (action.type) {
        case 'cancel':
          log.log('canceled');
          renderer.cleanupCanceled(prompt.message);
          throw new OperationCanceledError();
        case 'interrupt':
          log.log('interrupted');
          renderer.cleanupCanceled(prompt.message);
          throw new OperationInterruptedError();
        case 'inner':
          prompt.apply(action.action);
          continue;
        case 'submit':
          break;
      }

      if (stage.type === 'confirming') {
        if (!prompt.confirmation?.matches(stage.first)) {
          log.log('confirmation mismatch');
          renderer.resetPrompt();
          throw new ConfirmationMismatchError();
        }
        log.log('accepted');
        renderer.cleanup(prompt.message, prompt.format(stage.first));
        return stage.first;
      }

      const submission = await prompt.submit();
      log.log('submission', submission.type);
      if (submission.type === 'ignored') {
        continue;
      }
      if (submission.type === 'rejected') {
        error = submission.message;
        continue;
      }

      error = null;
      if (prompt.confirmation) {
        stage = { type: 'confirming', first: submission.answer };
        prompt.confirmation.enter();
        continue;
      }

      log.log('accepted');
      renderer.cleanup(prompt.message, prompt.format(submission.answer));
      return submission.answer;
    }
  } finally {
    renderer.dispose();
  }
}

/**
 * Runs a prompt against `context.backend`, or against the terminal when none
 * is given.
 */
export async function runPrompt<TAction, TAnswer>(prompt: Prompt<TAction, TAnswer>, context: PromptContext = {}): Promise<TAnswer> {
  const log = context.log ?? disabledLog;
  const renderConfig = context.renderConfig ?? resolveRenderConfig(context.config ?? DEFAULT_PROMPT_CONFIG);
  if (context.backend) {
    return drivePrompt(prompt, context.backend, renderConfig, log);
  }
  const backend = createTerminalBackend(log);
  try {
    return await drivePrompt(prompt, backend, renderConfig, log);
  } finally {
    backend.dispose();
  }
}
