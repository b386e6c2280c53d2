#!/usr/bin/env node
/**
 * CLI: Report Server
 *
 * Usage:
 *   vidreport-serve [options]
 *
 * Example:
 *   vidreport-serve --port 8080 --config ./.vidreport.yml
 */

import { ConfigParser, loadConfig, createConfigParser } from '../lib/config/index.js';
import { createReportApp } from '../app.js';

function readOption(args: string[], name: string): string | undefined {
  return args.includes(name) ? args[args.indexOf(name) + 1] : undefined;
}

async function main() {
  const args = process.argv.slice(2);

  if (args[0] === '--help' || args[0] === '-h') {
    console.log(`
vidreport - Report Server

Usage:
  vidreport-serve [options]

Options:
  --config    Config file (default: .vidreport.yml in the working directory)
  --port      Server port (default: 7860, or $PORT)
  --host      Host to bind (default: localhost, or $HOST)
  --data-dir  Where reports.json and screenshots/ live (default: ./.vidreport-data)
  --example   Print an example config file and exit

Example:
  vidreport-serve --port 8080
`);
    process.exit(0);
  }

  if (args.includes('--example')) {
    console.log(ConfigParser.generateExample());
    process.exit(0);
  }

  const loaded = await loadConfig(readOption(args, '--config'));
  const port = readOption(args, '--port');
  const config = createConfigParser().validate({
    ...loaded,
    data_dir: readOption(args, '--data-dir') ?? loaded.data_dir,
    server: {
      ...loaded.server,
      host: readOption(args, '--host') ?? loaded.server.host,
      port: port ? parseInt(port, 10) : loaded.server.port,
    },
  });

  console.log('🎬 Starting vidreport...\n');
  console.log(`  Port: ${config.server.port}`);
  console.log(`  Host: ${config.server.host}`);
  console.log(`  Data: ${config.data_dir}\n`);

  const { server } = createReportApp(config);
  await server.start();

  // Handle shutdown
  const shutdown = async () => {
    console.log('\n\nShutting down...');
    await server.stop();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((error) => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
