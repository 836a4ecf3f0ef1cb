#!/usr/bin/env node

import { ApiError, AuthenticationError, DrawingExporter } from './index';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import ora from 'ora';
import chalk from 'chalk';
import 'dotenv/config';

const argv = yargs(hideBin(process.argv))
  .usage('Usage: $0 [options]')
  .options({
    output: {
      alias: 'o',
      describe: 'Output directory to save data',
      default: 'data',
      type: 'string',
    },
    limit: {
      alias: 'l',
      describe: 'Limit the number of documents to search',
      default: 1000,
      type: 'number',
    },
    offset: {
      describe: 'Offset the documents to search',
      default: 0,
      type: 'number',
    },
    enable_logging: {
      describe: 'Whether to log API messages',
      default: false,
      type: 'boolean',
    },
    formats: {
      alias: 'f',
      describe: 'Translation formats to download',
      default: ['DWG', 'PNG'],
      type: 'string',
      array: true,
    },
    url: {
      alias: 'u',
      describe: 'Export a single document workspace or drawing by URL',
      type: 'string',
    },
    stack: {
      describe: 'Onshape stack URL (defaults to ONSHAPE_STACK or https://cad.onshape.com)',
      type: 'string',
    },
  })
  .check(argv => {
    if (!Number.isInteger(argv.limit) || argv.limit < 0) {
      throw new Error('Limit must be a non-negative integer');
    }
    if (!Number.isInteger(argv.offset) || argv.offset < 0) {
      throw new Error('Offset must be a non-negative integer');
    }
    return true;
  })
  .example('$0', 'Scan 1000 public documents and export their drawings to ./data')
  .example('$0 --offset 2000 --limit 200', 'Scan 200 documents starting at document 2000')
  .example('$0 -f DWG PDF -o ./drawings', 'Export DWG and PDF files to ./drawings')
  .example('$0 -u https://cad.onshape.com/documents/<did>/w/<wid>/e/<eid>', 'Export one drawing')
  .parseSync();

let spinner = ora();

async function main() {
  try {
    spinner = ora('Initializing Onshape drawing exporter...').start();

    const exporter = new DrawingExporter(
      {
        stack: argv.stack,
        outputPath: argv.output,
        formats: argv.formats,
        logging: argv.enable_logging,
      },
      {
        logger: message => {
          spinner.clear();
          console.log(chalk.gray(message));
          spinner.render();
        },
      }
    );

    exporter.on('pageStarted', ({ offset, limit }) => {
      spinner.text = `Listing documents ${offset}-${offset + limit - 1}...`;
    });

    exporter.on('noDrawings', ({ documentId }) => {
      spinner.text = `No drawings found in ${chalk.gray(documentId)}`;
    });

    exporter.on('drawingsFound', ({ documentId, count }) => {
      spinner.info(`Found ${chalk.green(count)} drawings in ${chalk.blue(documentId)}`);
      spinner.start();
    });

    exporter.on('fileSkipped', ({ filePath }) => {
      spinner.text = `Skipping: ${chalk.gray(filePath)}`;
    });

    exporter.on('translationRequested', ({ elementId, format }) => {
      spinner.text = `Translating ${chalk.blue(elementId)} to ${format}...`;
    });

    exporter.on('translationPolling', ({ translationId, attempt }) => {
      spinner.text = `Waiting for translation ${chalk.blue(translationId)} (poll ${attempt})...`;
    });

    exporter.on('multipleResults', ({ translationId, count }) => {
      spinner.warn(`Translation ${chalk.yellow(translationId)} produced ${count} files, keeping the first`);
      spinner.start();
    });

    exporter.on('downloadComplete', ({ filePath }) => {
      spinner.succeed(`Drawing exported: ${chalk.green(filePath)}`);
      spinner.start();
    });

    exporter.on('drawingExported', ({ total }) => {
      spinner.text = `Exported ${chalk.green(total)} drawings`;
    });

    process.on('SIGINT', () => {
      spinner.fail('Interrupted');
      process.exit(130);
    });

    const summary = argv.url
      ? await exporter.exportFromUrl(argv.url)
      : await exporter.run({ offset: argv.offset, limit: argv.limit });

    spinner.succeed(
      `Drawing count: ${chalk.green(summary.drawingCount)} from ${summary.documentCount} documents in ${chalk.blue(argv.output)}`
    );
  } catch (err) {
    spinner.fail('Error running Onshape drawing exporter');
    console.error(chalk.red('\nError details:'));

    if (err instanceof Error) {
      console.error(err.stack ?? err.message);
    }

    if (err instanceof AuthenticationError) {
      console.log(chalk.yellow('\nTo create API keys:'));
      console.log('1. Go to https://dev-portal.onshape.com and log in');
      console.log('2. Open API keys and create a new key pair');
      console.log('3. Set ONSHAPE_ACCESS_KEY and ONSHAPE_SECRET_KEY in your environment or .env file');
    }

    if (err instanceof ApiError && err.status) {
      console.error('\nAPI Response:', {
        status: err.status,
        data: err.data,
      });
    }

    process.exit(1);
  }
}

process.on('unhandledRejection', (err: unknown) => {
  console.error('Unhandled rejection:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});

void main();
