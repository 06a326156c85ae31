// Decode command for the toolbox CLI

import { Command } from 'commander';
import { HttpClient } from '../../services/http/http-client.js';
import { SecretMessageService } from '../../services/decode/secret-message-service.js';
import { loadRuntime } from '../runtime.js';
import { withErrorHandling } from '../utils/error-handler.js';

interface DecodeOptions {
  path: string;
  debug?: boolean;
  quiet?: boolean;
}

/**
 * Registers the decode command
 *
 * Supports:
 * - toolbox decode <url> [--quiet]
 */
export function registerDecodeCommand(program: Command): void {
  program
    .command('decode')
    .description('Print the secret message hidden in a published character table')
    .argument('<url>', 'Address of the published document')
    .option('-p, --path <path>', 'Project path holding .toolbox/config.yaml', process.cwd())
    .option('-q, --quiet', 'Do not log HTTP requests')
    .option('--debug', 'Enable debug logging')
    .action(withErrorHandling(async (url: string, options: DecodeOptions) => {
      const runtime = await loadRuntime(options.path, { debug: options.debug });
      const http = HttpClient.fromConfig(runtime.config.http, options.quiet ? { verbose: false } : {});
      const service = new SecretMessageService(http);

      try {
        const lines = await service.decode(url);
        for (const line of lines) {
          console.log(line);
        }
      } finally {
        await runtime.shutdown();
      }
    }));
}
