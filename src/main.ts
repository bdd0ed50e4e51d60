#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { generateJsonSchema, initConfig, loadCliConfig, type PromptConfig } from './cli-config.js';
import { OperationInterruptedError, PromptError, skippable } from './errors.js';
import { printUsage, printVersion } from './help.js';
import { createDebugLog, type DebugLog } from './logger.js';
import type { PromptContext } from './prompt.js';
import { confirm } from './prompts/confirm.js';
import { dateSelect } from './prompts/date-select.js';
import { multiSelect } from './prompts/multi-select.js';
import { password } from './prompts/password.js';
import { select } from './prompts/select.js';
import { text } from './prompts/text.js';
import { minLength, minSelections, required } from './validator.js';

const FRUITS = ['Apple', 'Banana', 'Blueberry', 'Cherry', 'Grape', 'Kiwi', 'Lemon', 'Mango', 'Orange', 'Peach', 'Pear', 'Plum', 'Strawberry'];

type Demo = (context: PromptContext) => Promise<unknown>;

const DEMOS = {
  text: (context: PromptContext) =>
    text(
      {
        message: 'Favourite fruit?',
        validators: [required()],
        suggester: (input) => (input.length === 0 ? [] : FRUITS.filter((f) => f.toLowerCase().startsWith(input.toLowerCase()))),
      },
      context,
    ),
  password: (context: PromptContext) => password({ message: 'Password:', displayMode: 'masked', displayToggle: true, validators: [minLength(4)] }, context),
  select: async (context: PromptContext) => (await select({ message: 'Pick a fruit', options: FRUITS }, context)).value,
  'multi-select': async (context: PromptContext) => (await multiSelect({ message: 'Pick some fruit', options: FRUITS, validators: [minSelections(1)] }, context)).map((o) => o.value),
  confirm: (context: PromptContext) => confirm({ message: 'Continue?', default: true }, context),
  date: async (context: PromptContext) => (await dateSelect({ message: 'Delivery date?' }, context)).toString(),
} satisfies Record<string, Demo>;

type DemoKind = keyof typeof DEMOS;

const isDemoKind = (kind: string): kind is DemoKind => kind in DEMOS;

async function runDemos(kinds: readonly DemoKind[], config: PromptConfig, log: DebugLog): Promise<void> {
  const context: PromptContext = { config, log };
  for (const kind of kinds) {
    const demo: Demo = DEMOS[kind];
    const answer = await skippable(demo(context));
    log.log('demo answer', kind, answer);
    // biome-ignore lint/suspicious/noConsole: demo output
    console.log(answer === null ? `${kind}: skipped` : `${kind}: ${JSON.stringify(answer)}`);
  }
}

const { values } = parseArgs({
  options: {
    version: { type: 'boolean', short: 'v', default: false },
    help: { type: 'boolean', short: 'h', default: false },
    'init-config': { type: 'boolean', default: false },
    schema: { type: 'boolean', default: false },
    demo: { type: 'string' },
  },
  strict: false,
});

if (values.version) {
  // biome-ignore lint/suspicious/noConsole: CLI --version output
  printVersion(console.log);
  process.exit(0);
}

if (values.help || process.argv.includes('-?')) {
  // biome-ignore lint/suspicious/noConsole: CLI --help output
  printUsage(console.log);
  process.exit(0);
}

if (values['init-config']) {
  // biome-ignore lint/suspicious/noConsole: CLI --init-config output
  initConfig(console.log);
  process.exit(0);
}

if (values.schema) {
  // biome-ignore lint/suspicious/noConsole: CLI --schema output
  console.log(JSON.stringify(generateJsonSchema(), null, 2));
  process.exit(0);
}

const requested = typeof values.demo === 'string' ? values.demo : null;
const kinds = requested === null ? Object.keys(DEMOS).filter(isDemoKind) : [requested].filter(isDemoKind);
if (kinds.length === 0) {
  // biome-ignore lint/suspicious/noConsole: CLI usage error
  console.error(`Unknown demo "${requested}". Expected one of: ${Object.keys(DEMOS).join(', ')}`);
  process.exit(2);
}

const { config, warnings } = loadCliConfig();
for (const warning of warnings) {
  // biome-ignore lint/suspicious/noConsole: config warnings before any prompt starts
  console.error(warning);
}
const log = createDebugLog(config.debugLog);

try {
  await runDemos(kinds, config, log);
} catch (err) {
  if (err instanceof OperationInterruptedError) {
    process.exitCode = 130;
  } else if (err instanceof PromptError) {
    // biome-ignore lint/suspicious/noConsole: prompt failure
    console.error(err.message);
    process.exitCode = 1;
  } else {
    throw err;
  }
}
