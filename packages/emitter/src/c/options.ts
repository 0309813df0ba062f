/**
 * Emitter options and defaults
 */

export type EmitterOptions = {
  /** Prefix of every generated global symbol */
  readonly symbolPrefix: string;
  /** Export macro placed on public declarations */
  readonly publicMacro: string;
  /** Calling-convention macro for the public function pointers */
  readonly callSpecMacro: string;
  /** Directory the public headers are included from */
  readonly headerDirectory: string;
};

export const defaultOptions: EmitterOptions = {
  symbolPrefix: "epoxy_",
  publicMacro: "EPOXY_PUBLIC",
  callSpecMacro: "EPOXY_CALLSPEC",
  headerDirectory: "epoxy",
};

export const resolveOptions = (
  options: Partial<EmitterOptions> = {}
): EmitterOptions => ({ ...defaultOptions, ...options });
