#!/usr/bin/env node

import { readFile } from 'fs/promises';
import { PageDistillServer } from './server';
import { APP_NAME, APP_VERSION } from './config/constants';
import { clearEnvironmentCache } from './config/environment';
import { getLogger } from './utils/logger';
import { CliUsageError, parseCliArgs, runExtract } from './commands/extract';
import type { CliIO } from './commands/extract';

const HELP_TEXT = `
${APP_NAME} v${APP_VERSION}

Extracts the main readable content from an HTML page as sanitized HTML and Markdown.

Usage: page-distill [command] [options]

Commands:
  extract        Extract an article from a file or stdin
  server         Start the MCP server (default)
  version        Show version information
  help           Show this help message

Extract Options:
  --file, -f <path>     Read HTML from a file instead of stdin
  --url <url>           Page URL, used to resolve relative links
  --output, -o <fmt>    json (default), markdown or text
  --min-words <n>       Minimum word count before warning about low content
  --max-chars <n>       Trim output to at most n characters (0 = unlimited)
  --lang <code>         Language to report when the page declares none
  --no-images           Drop images, video and audio
  --no-code             Drop code blocks

Options:
  --help, -h     Show help
  --version      Show version
  --verbose, -v  Verbose logging to stderr

Examples:
  page-distill extract --file article.html --url "https://example.com/post"
  curl -s https://example.com/post | page-distill extract --output markdown
  page-distill server
`;

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

const processIO: CliIO = {
  readStdin,
  readFile: path => readFile(path, 'utf8'),
  stdout: text => process.stdout.write(`${text}\n`),
  stderr: text => process.stderr.write(`${text}\n`),
};

async function main(): Promise<void> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`${error instanceof Error ? error.message : 'Invalid arguments'}. Use --help for usage information.`);
    process.exit(1);
  }
  const { values, positionals } = parsed;

  if (values.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  if (values.version) {
    console.log(`${APP_NAME} v${APP_VERSION}`);
    process.exit(0);
  }

  if (values.verbose) {
    process.env.PAGE_DISTILL_LOG_LEVEL = 'debug';
    clearEnvironmentCache();
  }

  const command = positionals[0] || 'server';

  switch (command) {
    case 'extract': {
      try {
        process.exitCode = await runExtract(values, processIO);
      } catch (error) {
        if (error instanceof CliUsageError) {
          console.error(`${error.message}. Use --help for usage information.`);
          process.exit(1);
        }
        throw error;
      }
      break;
    }

    case 'server': {
      const server = new PageDistillServer();

      const shutdown = async (signal: string) => {
        getLogger().info({ signal }, 'Received shutdown signal, closing gracefully...');
        try {
          await server.close();
          process.exit(0);
        } catch (error) {
          getLogger().error({ error }, 'Error during graceful shutdown');
          process.exit(1);
        }
      };

      process.on('SIGTERM', () => void shutdown('SIGTERM'));
      process.on('SIGINT', () => void shutdown('SIGINT'));

      await server.start();
      break;
    }

    case 'version': {
      console.log(`${APP_NAME} v${APP_VERSION}`);
      break;
    }

    case 'help': {
      console.log(HELP_TEXT);
      break;
    }

    default: {
      console.error(`Unknown command: ${command}`);
      console.error('Use --help for usage information.');
      process.exit(1);
    }
  }
}

if (require.main === module) {
  main().catch(error => {
    getLogger().error({ error }, 'CLI execution failed');
    console.error(`Fatal error: ${error instanceof Error ? error.message : 'unknown error'}`);
    process.exit(1);
  });
}
