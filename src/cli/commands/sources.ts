import type { Command } from 'commander';
import { parseCloudAccess } from '../../location/parser.js';
import { listCandidates } from '../../location/set.js';
import { requireRecords, requireSession, type RecordOptions } from '../cli-shared.js';

export function registerSourcesCommand(program: Command): void {
  program
    .command('sources')
    .description('List every candidate location of a record in selection order')
    .option('-r, --record <file>', 'JSON file holding one record or a list of records')
    .option('-u, --access-url <url>', 'On-prem access_url of the product')
    .option('-c, --cloud-access <json>', 'cloud_access descriptor text')
    .action((opts: RecordOptions) => {
      const { context } = requireSession();
      const records = requireRecords(opts);

      records.forEach((record, i) => {
        const { locations, errors } = parseCloudAccess(record.cloud_access, record.access_url);
        if (records.length > 1) console.log(`\nRecord ${i}: ${record.access_url}`);
        for (const loc of listCandidates(locations)) {
          const policy = context.classifier.classify(loc);
          const where = loc.provider === 'on-prem' ? loc.url : `${loc.identifier}/${loc.key}`;
          const region = loc.region ? ` [${loc.region}]` : '';
          console.log(`  ${loc.source.padEnd(12)} ${loc.provider.padEnd(13)} ${policy.padEnd(10)} ${where}${region}`);
        }
        for (const err of errors) console.log(`  warning: ${err.message}`);
      });
    });
}
