#!/usr/bin/env node
import 'reflect-metadata';
import { Logger, LogLevel, Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { SourceLoadError, formatErrorMessage } from './common/errors';
import { RawSnapshotSchema } from './common/raw-snapshot.schema';
import { AppConfigModule } from './config/app-config.module';
import {
  MappingBuildService,
  MappingModule,
  VENDOR_VOCABULARIES,
} from './mapping';
import { NormalizationModule, NormalizerService } from './normalization';

/**
 * Build context: no NormalizationModule, which needs an existing artifact
 */
@Module({ imports: [AppConfigModule, MappingModule] })
class MappingBuildCliModule {}

@Module({ imports: [AppConfigModule, NormalizationModule] })
class NormalizeCliModule {}

const logger = new Logger('pv-mapping');

async function runBuild(options: {
  sources?: string;
  out?: string;
  verbose: boolean;
}): Promise<number> {
  const logLevels: LogLevel[] = options.verbose
    ? ['error', 'warn', 'log', 'debug']
    : ['error', 'warn', 'log'];
  const app = await NestFactory.createApplicationContext(
    MappingBuildCliModule,
    { logger: logLevels },
  );

  try {
    const result = await app.get(MappingBuildService).build({
      sourcesDir: options.sources,
      artifactPath: options.out,
    });
    logger.log(
      `Built ${result.artifact.pointCount} points (${result.warnings.length} warnings, ` +
        `${result.stats.unreferencedDefinitions} unreferenced definitions) in ${result.durationMs}ms`,
    );
    return 0;
  } catch (error) {
    if (error instanceof SourceLoadError) {
      logger.error(`Build aborted: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    await app.close();
  }
}

async function runNormalize(
  snapshotPath: string,
  options: { vocabulary: string },
): Promise<number> {
  const vocabulary = z.enum(VENDOR_VOCABULARIES).safeParse(options.vocabulary);
  if (!vocabulary.success) {
    logger.error(
      `Unknown vocabulary '${options.vocabulary}'. Expected one of: ${VENDOR_VOCABULARIES.join(', ')}`,
    );
    return 1;
  }

  const snapshot = RawSnapshotSchema.safeParse(
    JSON.parse(await readFile(snapshotPath, 'utf-8')),
  );
  if (!snapshot.success) {
    const issue = snapshot.error.issues[0];
    logger.error(
      `Invalid snapshot ${snapshotPath} at '${issue.path.join('.') || '(root)'}': ${issue.message}`,
    );
    return 1;
  }

  // stdout carries the result; only errors are logged
  const app = await NestFactory.createApplicationContext(NormalizeCliModule, {
    logger: ['error'],
  });
  try {
    const devices = app
      .get(NormalizerService)
      .normalizeSnapshot(vocabulary.data, snapshot.data);
    process.stdout.write(`${JSON.stringify(devices, null, 2)}\n`);
    return 0;
  } finally {
    await app.close();
  }
}

async function main() {
  const program = new Command();

  program
    .name('pv-mapping')
    .description(
      'Build the canonical point mapping and normalize datalogger snapshots',
    );

  program
    .command('build')
    .description('Resolve captures and workbooks into the mapping artifact')
    .option('--sources <dir>', 'Source directory (default: MAPPING_SOURCES_DIR)')
    .option('--out <file>', 'Artifact path (default: MAPPING_ARTIFACT_PATH)')
    .option('--verbose', 'Log resolution details', false)
    .action(
      async (options: { sources?: string; out?: string; verbose: boolean }) => {
        process.exitCode = await runBuild(options);
      },
    );

  program
    .command('normalize')
    .description('Normalize a /livedata snapshot file and print it as JSON')
    .argument('<snapshot>', 'Path to the snapshot JSON file')
    .requiredOption(
      '--vocabulary <vocabulary>',
      `Snapshot vocabulary (${VENDOR_VOCABULARIES.join(' | ')})`,
    )
    .action(async (snapshotPath: string, options: { vocabulary: string }) => {
      process.exitCode = await runNormalize(snapshotPath, options);
    });

  await program.parseAsync();
}

main().catch((error) => {
  console.error('Fatal error:', formatErrorMessage(error));
  process.exit(1);
});
