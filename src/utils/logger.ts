/**
 * Logger utility with verbose mode support
 * - info(): always prints (concise mode)
 * - debug(): only prints with --verbose
 * - summary(): final generation statistics
 */

export interface LoggerConfig {
  verbose?: boolean;
}

export interface SummaryStats {
  tree?: {
    nodes: number;
    height: number;
  };
  pages?: {
    node: number;
    null: number;
  };
  stylesheet?: 'shared' | 'inline';
}

const PREFIX = '[tree-site]';

class Logger {
  private verbose: boolean = false;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
  }

  /**
   * Set verbose mode
   */
  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  /**
   * Always prints - used for concise summary lines
   */
  info(message: string): void {
    console.log(`${PREFIX} ${message}`);
  }

  /**
   * Only prints in verbose mode - used for per-page writes and resolved options
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`${PREFIX} DEBUG: ${message}`);
    }
  }

  /**
   * Print final summary statistics
   */
  summary(stats: SummaryStats): void {
    const lines: string[] = [];

    if (stats.tree) {
      lines.push(`Tree: ${stats.tree.nodes} nodes, height ${stats.tree.height}`);
    }

    if (stats.pages) {
      const total = stats.pages.node + stats.pages.null;
      lines.push(
        `Pages: ${total} written (${stats.pages.node} node, ${stats.pages.null} null)`
      );
    }

    if (stats.stylesheet) {
      lines.push(`Stylesheet: ${stats.stylesheet}`);
    }

    lines.forEach((line) => this.info(line));
  }

  /**
   * Print a phase completion message
   */
  phaseComplete(phaseName: string, details?: string): void {
    const msg = details
      ? `${phaseName} complete: ${details}`
      : `${phaseName} complete`;
    this.info(msg);
  }

  /**
   * Print a phase start message (verbose only)
   */
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

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton.
 * A config passed after creation still updates verbosity.
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
  } else if (config?.verbose !== undefined) {
    loggerInstance.setVerbose(config.verbose);
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

export { Logger };
