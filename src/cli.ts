#!/usr/bin/env node
import 'dotenv/config';
import 'reflect-metadata';
import { promises as fs } from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import { NestFactory } from '@nestjs/core';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { CreateSummaryDto } from './document-summaries/dto/create-summary.dto';
import { FailedDocument } from './document-summaries/domain/services/document-summary.domain.service';
import { validateSummaryMarkdown } from './document-summaries/utils/summary-markdown.parser';
import { sanitizeErrorMessage } from './audit/utils/phi-sanitizer.util';
import { isMissingFileError } from './utils/fs-errors';

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export const USAGE = [
  'Usage:',
  '  clinical-summary process <record.json...> [--output <dir>]',
  '  clinical-summary validate <summary.md...>',
].join('\n');

interface LoadedRecords {
  records: CreateSummaryDto[];
  failed: FailedDocument[];
}

/**
 * Read extraction-record files. Missing and non-JSON files are reported
 * and skipped; unparsable or invalid records are listed as run failures.
 */
async function loadRecords(
  files: string[],
  output: CliOutput,
): Promise<LoadedRecords> {
  const loaded: LoadedRecords = { records: [], failed: [] };

  for (const file of files) {
    const name = path.basename(file);

    if (path.extname(file).toLowerCase() !== '.json') {
      output.error(`⚠️  Skipping ${name}: not a .json extraction record`);
      continue;
    }

    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        output.error(`⚠️  Skipping ${name}: file not found`);
        continue;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      loaded.failed.push({ file: name, error: 'Invalid JSON' });
      continue;
    }

    const dto = plainToInstance(CreateSummaryDto, json);
    const errors = await validate(dto, { whitelist: true });
    if (errors.length > 0) {
      loaded.failed.push({
        file: name,
        error: `Invalid extraction record: ${errors
          .map((error) => error.property)
          .join(', ')}`,
      });
      continue;
    }
    loaded.records.push(dto);
  }

  return loaded;
}

async function processCommand(
  files: string[],
  outputDir: string | undefined,
  output: CliOutput,
): Promise<number> {
  // Must be set before the module graph is loaded: the persistence driver
  // is chosen at import time
  process.env.DATABASE_DRIVER = 'memory';
  process.env.ARTIFACT_STORAGE_DRIVER = 'local';
  if (outputDir) {
    process.env.ARTIFACT_OUTPUT_DIR = outputDir;
  }

  const { records, failed } = await loadRecords(files, output);
  if (records.length === 0 && failed.length === 0) {
    output.error('No extraction records to process');
    return 1;
  }

  const { CliModule } = await import('./cli.module');
  const { DocumentSummariesService } = await import(
    './document-summaries/document-summaries.service'
  );

  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: ['error', 'warn'],
  });

  try {
    const result = await app
      .get(DocumentSummariesService)
      .processBatch(records, failed);

    output.log(`Processed ${result.processed.length} document(s)`);
    for (const [type, count] of Object.entries(
      result.report.statistics.byType,
    )) {
      output.log(`  ${type}: ${count}`);
    }
    for (const failure of result.failed) {
      output.error(`❌ ${failure.file}: ${failure.error}`);
    }
    output.log(`Master report: ${result.report.markdownLocation}`);

    return result.processed.length === 0 ? 1 : 0;
  } finally {
    await app.close();
  }
}

async function validateCommand(
  files: string[],
  output: CliOutput,
): Promise<number> {
  if (files.length === 0) {
    output.error(USAGE);
    return 2;
  }

  let invalid = 0;
  for (const file of files) {
    let markdown: string;
    try {
      markdown = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error;
      }
      output.error(`❌ ${file}: file not found`);
      invalid++;
      continue;
    }

    const issues = validateSummaryMarkdown(markdown);
    if (issues.length === 0) {
      output.log(`✅ ${file}`);
      continue;
    }

    invalid++;
    output.log(`❌ ${file}`);
    for (const issue of issues) {
      output.log(`  - ${issue}`);
    }
  }

  return invalid > 0 ? 1 : 0;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/**
 * @returns Process exit code
 */
export async function runCli(
  argv: string[],
  output: CliOutput = consoleOutput,
): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    output.error(error instanceof Error ? error.message : String(error));
    output.error(USAGE);
    return 2;
  }

  const [command, ...files] = parsed.positionals;

  if (parsed.values.help) {
    output.log(USAGE);
    return 0;
  }

  switch (command) {
    case 'process':
      if (files.length === 0) {
        output.error(USAGE);
        return 2;
      }
      return processCommand(files, parsed.values.output, output);
    case 'validate':
      return validateCommand(files, output);
    default:
      output.error(USAGE);
      return 2;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(
        sanitizeErrorMessage(
          error instanceof Error ? error.message : String(error),
        ),
      );
      process.exitCode = 1;
    });
}
