/**
 * kbase serve command
 */

import { Command, Option } from 'commander';
import { serve } from '../../index.js';
import { installGlobalErrorHandlers } from '../../utils/global-error-handlers.js';
import { getTransportType, PORT, type TransportType } from '../../config.js';
import { errorMessage } from '../../types/index.js';
import { writeError } from '../output.js';
import { parsePositiveInt } from '../parse.js';

interface ServeCommandOptions {
    transport: TransportType;
    port: number;
}

export function serveCommand(program: Command): void {
    program
        .command('serve')
        .description('Start the MCP server')
        .addOption(
            new Option('-t, --transport <type>', 'MCP transport')
                .choices(['stdio', 'http'])
                .default(getTransportType())
        )
        .option('-p, --port <port>', 'HTTP port', parsePositiveInt, PORT)
        .hook('preAction', (thisCommand) => {
            // Logging reads the transport to decide between stdout and stderr
            const transport: unknown = thisCommand.opts()['transport'];
            if (transport === 'stdio' || transport === 'http') process.env['TRANSPORT_TYPE'] = transport;
        })
        .action(async (options: ServeCommandOptions) => {
            installGlobalErrorHandlers();
            try {
                await serve({ transport: options.transport, port: options.port });
            } catch (error) {
                writeError(errorMessage(error));
                process.exitCode = 1;
            }
        });
}
