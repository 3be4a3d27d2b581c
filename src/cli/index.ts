#!/usr/bin/env node
/**
 * kbase - command-line entry for the knowledge-base MCP server
 */

import 'dotenv/config';
import { Command } from 'commander';
import { serveCommand } from './commands/serve.js';
import { updateEmbeddingsCommand } from './commands/update-embeddings.js';
import { searchCommand } from './commands/search.js';
import { packageVersion } from '../utils/build-version.js';
import { writeError } from './output.js';

const program = new Command();

program
    .name('kbase')
    .description('Knowledge-base MCP server and maintenance commands')
    .version(packageVersion);

serveCommand(program);
updateEmbeddingsCommand(program);
searchCommand(program);

program.parseAsync().catch((error: unknown) => {
    writeError(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
