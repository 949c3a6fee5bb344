#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, DESCRIPTION } from './config/branding.js';
import {
  registerVersion,
  registerSync,
  registerStatus,
  registerConfig,
  registerRequirements,
} from './commands/index.js';

const program = new Command()
  .name(APP_NAME)
  .description(`${DESCRIPTION}: repositories, a locked virtualenv and the server configuration.`)
  .enablePositionalOptions()
  .showHelpAfterError(true);

registerVersion(program);
registerSync(program);
registerStatus(program);
registerConfig(program);
registerRequirements(program);

await program.parseAsync();
