/**
 * Console output for commands, gated by --verbose and --quiet
 */

export type Reporter = {
  /** Progress; suppressed by --quiet */
  readonly info: (message: string) => void;
  /** Only shown with --verbose */
  readonly detail: (message: string) => void;
  /** Always shown, on stderr */
  readonly error: (message: string) => void;
};

export const createConsoleReporter = (options: {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
}): Reporter => ({
  info: (message) => {
    if (!options.quiet) console.log(message);
  },
  detail: (message) => {
    if (options.verbose && !options.quiet) console.log(message);
  },
  error: (message) => {
    console.error(message);
  },
});
