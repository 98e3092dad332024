import { resolve } from 'path';
import {
  createRunContext,
  orchestrateApply,
  orchestrateListBackups,
  orchestrateRestore,
  orchestrateScan,
  orchestrateSuggest,
  type RunContext,
} from '../core/index.js';
import type { FileOps } from '../deletion/file-ops.js';
import { resolveBackupConfig, resolveScanConfig, type Env } from '../utils/config.js';
import { EXIT_CODES, PartialFailureError, handleError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import type {
  ApplyCliOptions,
  BackupCliOptions,
  CliHandlers,
  RestoreCliOptions,
  ScanCliOptions,
  SuggestCliOptions,
} from './types.js';

export interface HandlerDeps {
  env?: Env;
  createLogger?: (verbose: boolean) => Logger;
  now?: () => Date;
  fileOps?: Partial<FileOps>;
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

export function createHandlers(deps: HandlerDeps = {}): CliHandlers {
  const env = deps.env ?? process.env;
  const makeLogger = deps.createLogger ?? ((verbose: boolean) => new Logger({ verbose }));

  async function withContext(
    verbose: boolean | undefined,
    body: (ctx: RunContext) => Promise<void>
  ): Promise<number> {
    const ctx = createRunContext({ logger: makeLogger(verbose ?? false), now: deps.now });
    try {
      await body(ctx);
      return EXIT_CODES.SUCCESS;
    } catch (error) {
      return handleError(error, ctx.logger);
    }
  }

  return {
    scan: (root: string, options: ScanCliOptions) =>
      withContext(options.verbose, async (ctx) => {
        const backup = resolveBackupConfig({}, env);
        const config = resolveScanConfig(
          root,
          {
            threshold: options.threshold,
            extensions: options.extensions,
            batchSize: options.batchSize,
            hashSize: options.hashSize,
            recursive: options.recursive,
          },
          env,
          backup
        );
        const report = await orchestrateScan(config, resolve(options.out), ctx);
        const { results } = report;

        ctx.logger.summary({
          label: 'Scan',
          succeeded: report.hashed,
          failed: report.inaccessible,
          skipped: 0,
        });
        ctx.logger.info(
          `${results.exact_groups.length} exact group(s), ${results.similar_groups.length} similar group(s)`
        );

        if (report.inaccessible > 0) {
          throw PartialFailureError.fromCounts('Scan', report.inaccessible, results.scan_metadata.total_scanned);
        }
        if (report.unlistedDirs > 0) {
          throw PartialFailureError.fromUnlistedDirs(report.unlistedDirs);
        }
      }),

    applyDeletions: (requestPath: string, options: ApplyCliOptions) =>
      withContext(options.verbose, async (ctx) => {
        const backup = resolveBackupConfig(
          { backupRoot: options.backupRoot, backupPattern: options.backupPattern },
          env
        );
        const report = await orchestrateApply(resolve(requestPath), backup, ctx, deps.fileOps);
        const stale = report.outcomes.filter((outcome) => outcome.kind === 'StaleSelection').length;

        ctx.logger.summary({
          label: 'Deletion',
          succeeded: report.deleted,
          failed: report.failed - stale,
          skipped: stale,
        });
        ctx.logger.info(`Undo with: image-dedupe restore ${report.backupId}`);

        if (report.failed > 0) {
          throw PartialFailureError.fromCounts('Deletion', report.failed, report.requested);
        }
      }),

    restore: (backupId: string, options: RestoreCliOptions) =>
      withContext(options.verbose, async (ctx) => {
        const backup = resolveBackupConfig({ backupRoot: options.backupRoot }, env);
        const report = await orchestrateRestore(backupId, backup, options.overwrite ?? false, ctx);
        const alreadyPresent = report.outcomes.filter((outcome) => outcome.alreadyPresent === true).length;

        ctx.logger.summary({
          label: 'Restore',
          succeeded: report.restored - alreadyPresent,
          failed: report.failed,
          skipped: alreadyPresent,
        });

        if (report.failed > 0) {
          throw PartialFailureError.fromCounts('Restore', report.failed, report.outcomes.length);
        }
      }),

    listBackups: (options: BackupCliOptions) =>
      withContext(options.verbose, async (ctx) => {
        const backup = resolveBackupConfig({ backupRoot: options.backupRoot }, env);
        const listings = await orchestrateListBackups(backup);

        if (listings.length === 0) {
          ctx.logger.info(`No backups in ${backup.backupRoot}`);
          return;
        }
        for (const listing of listings) {
          if (listing.status === 'corrupt') {
            ctx.logger.warn(`${listing.backupId}  CORRUPT  ${listing.reason}`);
          } else {
            ctx.logger.info(
              `${listing.backupId}  ${listing.state}  ${listing.entryCount} file(s)  ` +
                `${formatBytes(listing.totalBytes)}  created ${listing.createdAt}`
            );
          }
        }
      }),

    suggest: (resultsPath: string, options: SuggestCliOptions) =>
      withContext(options.verbose, async (ctx) => {
        await orchestrateSuggest(resolve(resultsPath), resolve(options.out), ctx);
      }),
  };
}
