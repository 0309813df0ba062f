/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
dispatchgen - lazy GL/EGL/GLX/WGL dispatch generator v${VERSION}

USAGE:
  dispatchgen <command> [options]
  dispatchgen <file.xml>... [options]

COMMANDS:
  generate [file.xml...]    Generate dispatch code for each registry
  help                      Show this message
  version                   Show version

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: dispatchgen.json)

GENERATE OPTIONS:
  -o, --outputdir <dir>     Destination directory (default: current dir)
  --includedir <dir>        Destination for headers and VAPI files
  --srcdir <dir>            Destination for dispatch sources
  --header, --no-header     Write <target>_generated.h
  --source, --no-source     Write <target>_generated_dispatch.c
  --vapi, --no-vapi         Write <target>_generated.vapi

When no artifact is selected, the header and the source are written.

EXAMPLES:
  dispatchgen gl.xml egl.xml glx.xml wgl.xml
  dispatchgen generate gl.xml --includedir include/epoxy --srcdir src
  dispatchgen gl.xml --vapi --no-source --no-header
`);
};
