import { createContext } from './context.js';
import type { ContextOptions, GalleryContext } from './context.js';

const USAGE = 'Usage: gallery-sidecars <validate|scan>';

export async function runCli(
  args: string[],
  makeContext: (options?: ContextOptions) => Promise<GalleryContext> = createContext
): Promise<number> {
  const [command] = args;
  if (command !== 'validate' && command !== 'scan') {
    console.error(USAGE);
    return 2;
  }

  const ctx = await makeContext();
  if (command === 'validate') {
    const { total, changed } = await ctx.reconciler.migrateAll();
    console.log(`Validated ${total} images; updated ${changed} sidecars.`);
  } else {
    const pending = await ctx.reconciler.scan(true, false);
    console.log(`${pending.length} images pending review.`);
  }
  return 0;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e) => {
      console.error(e);
      process.exit(1);
    });
}
