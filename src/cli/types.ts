/**
 * CLI argument parsing types
 */

export interface CliOptions {
  out: string;
  verbose?: boolean;
  nullPages?: boolean;
  inlineCss?: boolean;
  stylesheet?: string;
  tree?: string;
}
