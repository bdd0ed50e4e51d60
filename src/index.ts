export type { InputAction, KeyMapper, ListNavigation, PromptAction } from './actions.js';
export { inputActionFromKey, listNavigationFromKey, promptActionFromKey } from './actions.js';
export type { Backend, Color, TextStyle } from './backend.js';
export type { Environment, PromptConfig } from './cli-config.js';
export { applyEnvironment, CONFIG_PATH, DEFAULT_PROMPT_CONFIG, generateJsonSchema, loadCliConfig, resolveRenderConfig } from './cli-config.js';
export type { EditorSplit, EditorState } from './editor.js';
export { applyInputAction, createEditor, getText } from './editor.js';
export {
  BackendError,
  ConfirmationMismatchError,
  EndOfInputError,
  InvalidConfigurationError,
  OperationCanceledError,
  OperationInterruptedError,
  PromptError,
  skippable,
} from './errors.js';
export type { CharKey, Key, KeyInput, KeyModifiers, KeySource, NamedKey, SpecialKey } from './input.js';
export { charKey, namedKey, StdinKeySource, translateKey } from './input.js';
export type { DebugLog } from './logger.js';
export { createDebugLog, disabledLog, FileDebugLog } from './logger.js';
export type { Page } from './pager.js';
export { paginate, wrapCursor } from './pager.js';
export type { Confirmation, Prompt, PromptContext, Submission } from './prompt.js';
export { drivePrompt, runPrompt } from './prompt.js';
export type { ConfirmOptions } from './prompts/confirm.js';
export { ConfirmPrompt, confirm, parseConfirmation } from './prompts/confirm.js';
export type { DateSelectOptions } from './prompts/date-select.js';
export { DateSelectPrompt, dateSelect, formatDate } from './prompts/date-select.js';
export type { Filter, ListOption } from './prompts/list.js';
export type { MultiSelectOptions } from './prompts/multi-select.js';
export { MultiSelectPrompt, multiSelect } from './prompts/multi-select.js';
export type { PasswordDisplayMode, PasswordOptions } from './prompts/password.js';
export { PasswordPrompt, password } from './prompts/password.js';
export type { SelectOptions } from './prompts/select.js';
export { SelectPrompt, select } from './prompts/select.js';
export type { TextOptions } from './prompts/text.js';
export { TextPrompt, text } from './prompts/text.js';
export type { RenderConfig } from './render-config.js';
export { COLORLESS_RENDER_CONFIG, createRenderConfig, DEFAULT_RENDER_CONFIG } from './render-config.js';
export type { Token } from './renderer.js';
export { Renderer } from './renderer.js';
export { AnsiBackend, createTerminalBackend } from './terminal.js';
export type { Validation, Validator } from './validator.js';
export { invalid, maxLength, minLength, minSelections, required, valid } from './validator.js';
