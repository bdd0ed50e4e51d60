import { readFileSync } from 'node:fs';
import { z } from 'zod';

type Log = (msg: string) => void;

const packageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
});

export type PackageInfo = z.infer<typeof packageInfoSchema>;

export function readPackageInfo(url = new URL('../package.json', import.meta.url)): PackageInfo {
  return packageInfoSchema.parse(JSON.parse(readFileSync(url, 'utf8')));
}

export function printVersion(log: Log, info = readPackageInfo()): void {
  log(`${info.name} ${info.version}`);
}

export function printUsage(log: Log, info = readPackageInfo()): void {
  log(`${info.name} ${info.version}`);
  log('');
  log(`Usage: ${info.name} [options]`);
  log('');
  log('Options:');
  log('  --demo <kind>   Run one prompt: text, password, select, multi-select, confirm, date');
  log('  --init-config   Write the default config file');
  log('  --schema        Print the config file JSON schema');
  log('  -v, --version   Show version information');
  log('  -h, --help, -?  Show this help message');
  log('');
  log('Controls:');
  log('  Enter           Submit');
  log('  Escape          Cancel the prompt');
  log('  Ctrl+C          Interrupt');
}
