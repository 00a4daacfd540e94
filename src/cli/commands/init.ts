import type { Command } from 'commander';
import { existsSync } from 'node:fs';
import { writeConfig } from '../../workspace/config.js';
import { getLocatorPaths } from '../../workspace/paths.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Write a default .cloudloc/config.yaml in the current directory')
    .option('-s, --default-source <token>', 'Source used when --source is not given', 'default')
    .option('--profile-store <path>', 'Credential profile store (YAML)')
    .option('--public-bucket <name...>', 'Buckets that allow anonymous reads', [])
    .option('--force', 'Overwrite an existing config', false)
    .action((opts: { defaultSource: string; profileStore?: string; publicBucket: string[]; force: boolean }) => {
      const paths = getLocatorPaths();
      if (existsSync(paths.config) && !opts.force) {
        console.error(`Config already exists at ${paths.config}. Use --force to overwrite.`);
        process.exit(1);
      }

      writeConfig(paths.config, {
        defaultSource: opts.defaultSource,
        profileStore: opts.profileStore ?? paths.profileStore,
        publicBuckets: opts.publicBucket,
      });
      console.log(`Config written to ${paths.config}`);
      console.log(`\nNext steps:`);
      console.log(`  cloudloc doctor    – check credential environment`);
      console.log(`  cloudloc resolve   – resolve a record to a fetch handle`);
    });
}
