#!/usr/bin/env node
/**
 * Image prewarmer CLI
 */

import { Command, Option } from 'commander';
import { VERSION } from './version';
import { DEFAULT_ENDPOINT } from './config';
import { OUTPUT_FORMATS } from './types';
import {
  GlobalOptions,
  availableImagesCmd,
  createContext,
  createTargetCmd,
  deleteTargetCmd,
  desiredImagesCmd,
  getTargetCmd,
  listTargetsCmd,
  reportError,
} from './commands';

const program = new Command();

program
  .name('prewarm')
  .description('Manage image prewarm targets')
  .version(VERSION)
  .option('-e, --endpoint <url>', `Management API endpoint (default: $PREWARM_ENDPOINT or ${DEFAULT_ENDPOINT})`)
  .addOption(new Option('-o, --output <format>', 'Output format').choices([...OUTPUT_FORMATS]));

const context = () => createContext(program.opts<GlobalOptions>());

program
  .command('list')
  .alias('ls')
  .description('List targets')
  .action(() => listTargetsCmd(context()));

program
  .command('get')
  .alias('info')
  .description('Show the latest state of a target')
  .argument('<name>', 'Target name')
  .action((name: string) => getTargetCmd(name, context()));

program
  .command('available')
  .description('List desired images already cached on every node of a target')
  .argument('<name>', 'Target name')
  .action((name: string) => availableImagesCmd(name, context()));

program
  .command('desired')
  .description('List desired images of a target in pull order')
  .argument('<name>', 'Target name')
  .action((name: string) => desiredImagesCmd(name, context()));

program
  .command('create')
  .alias('apply')
  .description('Create or replace a target from a JSON file')
  .argument('<file>', 'Target definition file')
  .action((file: string) => createTargetCmd(file, context()));

program
  .command('delete')
  .alias('rm')
  .description('Delete a target')
  .argument('<name>', 'Target name')
  .action((name: string) => deleteTargetCmd(name, context()));

program.parseAsync().catch(reportError);
