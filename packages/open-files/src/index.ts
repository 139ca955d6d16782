/**
 * @errtally/open-files
 *
 * Example consumer of @errtally/core: open a list of files, collect every
 * failure in one error record, report or abort.
 */

export { type CliArgs, main, parseArgs, UNKNOWN_FLAG_TAG } from "./cli.js";
export { type ParsedArgs, parseArgv } from "./args.js";
export { type OpenedFile, openFiles } from "./open-files.js";
export { registerReportTags, reportOpenFailures, WARNING_TAG, WFILE_TAG } from "./report.js";

export const PACKAGE_NAME = "@errtally/open-files";
export const PACKAGE_VERSION = "0.1.0";
