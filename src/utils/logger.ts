/**
 * Logger utility with verbose mode support
 * - info(): always prints (concise mode)
 * - debug(): only prints with --verbose
 * - progress(): phase progress indicator
 * - summary(): final summary counts
 */

export interface LoggerConfig {
  verbose?: boolean;
  /** Suppress everything except warnings and errors */
  quiet?: boolean;
}

export interface ProgressStats {
  phase: string;
  current: number;
  total: number;
}

export interface SummaryStats {
  /** Label printed before the counts, e.g. "Scan" */
  label: string;
  succeeded: number;
  failed: number;
  skipped: number;
}

const PREFIX = '[image-dedupe]';

export class Logger {
  private verbose: boolean;
  private readonly quiet: boolean;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
    this.quiet = config?.quiet ?? false;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  /**
   * Always prints - used for concise summary lines
   */
  info(message: string): void {
    if (this.quiet) return;
    console.log(`${PREFIX} ${message}`);
  }

  /**
   * Only prints in verbose mode - per-file steps and skipped entries
   */
  debug(message: string): void {
    if (this.verbose && !this.quiet) {
      console.log(`${PREFIX} DEBUG: ${message}`);
    }
  }

  /**
   * Progress indicator for a phase
   * Concise mode only logs at milestones (0%, 50%, 100%)
   */
  progress(stats: ProgressStats): void {
    if (this.quiet) return;
    const { phase, current, total } = stats;
    const percentage = total > 0 ? Math.round((current / total) * 100) : 0;

    if (this.verbose) {
      console.log(`${PREFIX} PROGRESS: ${phase} - ${current}/${total} (${percentage}%)`);
    } else if (current === 0 || current === total || percentage === 50) {
      console.log(`${PREFIX} ${phase}: ${current}/${total} (${percentage}%)`);
    }
  }

  summary(stats: SummaryStats): void {
    const { label, succeeded, failed, skipped } = stats;
    this.info(`${label} summary: ${succeeded} succeeded, ${failed} failed, ${skipped} skipped`);
  }

  phaseComplete(phaseName: string, details?: string): void {
    const msg = details ? `${phaseName} complete: ${details}` : `${phaseName} complete`;
    this.info(msg);
  }

  phaseStart(phaseName: string): void {
    this.debug(`Starting phase: ${phaseName}`);
  }

  warn(message: string): void {
    console.warn(`${PREFIX} WARNING: ${message}`);
  }

  error(message: string): void {
    console.error(`${PREFIX} ERROR: ${message}`);
  }
}

export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}
