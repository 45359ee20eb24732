import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadConfig } from '../src/infrastructure/config.js';
import { logger } from '../src/infrastructure/logger.js';
import { createContainer } from '../src/container.js';

const log = logger.child({ module: 'test-extraction' });

function printUsage(): never {
  console.error('Usage: npm run extract -- <text-file> [--retrieval] [--calibrate]');
  console.error('Example: npm run extract -- ./lists/weekly.txt --calibrate');
  process.exit(1);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const filePath = args.find((arg) => !arg.startsWith('--'));
  if (!filePath) printUsage();

  const config = loadConfig();
  const { pipeline } = createContainer(config);

  const text = await readFile(resolve(filePath), 'utf-8');
  log.info({ filePath, textLength: text.length, provider: config.llm.provider }, 'Running grocery extraction');

  const result = await pipeline.process({
    text,
    useRetrieval: args.includes('--retrieval'),
    calibrate: args.includes('--calibrate'),
  });

  if (!result.ok) {
    console.error(JSON.stringify(result.error, null, 2));
    process.exit(1);
  }

  console.log(JSON.stringify(result.value, null, 2));
}

main().catch((err: unknown) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Extraction failed');
  process.exit(1);
});
