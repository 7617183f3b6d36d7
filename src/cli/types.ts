/**
 * CLI type definitions.
 */

/**
 * CLI flags parsed from command line arguments.
 * These map to meow options in src/index.ts.
 */
export interface CLIFlags {
  /** Skills root directory (positional argument) */
  root?: string;
  /** Treat warnings as failures */
  strict?: boolean;
  /** Report format, validated by the validate command */
  format?: string;
  /** Explicit config file */
  config?: string;
  /** Enable debug output */
  verbose?: boolean;
}
