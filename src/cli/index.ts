#!/usr/bin/env node
import { Command, Option } from 'commander';
import { run, type CliOptions } from './run';

const program = new Command();

program
  .name('dtocast')
  .description('Convert JSON data with a dtocast schema')
  .version('0.1.0')
  .argument('<folder>', 'folder path containing schema.json and input.json')
  .option('--pretty [n]', 'pretty-print JSON with n spaces (default: 2)', false)
  .option('--minify', 'minify JSON (overrides --pretty)', false)
  .option('-o, --out <file>', 'output file name inside the folder (default: output.json)')
  .addOption(new Option('--extra <policy>', 'policy for undeclared keys').choices(['prevent', 'allow', 'remove']))
  .option('--enforce-inclusive', 'require inclusive groups to be all present or all absent', false)
  .option('--mock <seed>', 'write mock.json generated from the seed instead of converting input.json')
  .option('--describe', 'also write schema.out.json (schema_id + description)', false)
  .action(async (folder: string, opts: CliOptions) => {
    process.exitCode = await run(folder, opts);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`💥 Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
