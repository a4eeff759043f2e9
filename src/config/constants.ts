/**
 * Fixed names, paths and build metadata.
 */

export const CLI_NAME = "specify";

export const VERSION = "0.1.0";
export const BUILD_COMMIT = process.env["SPECIFY_BUILD_COMMIT"] ?? "dev";
export const BUILD_DATE = process.env["SPECIFY_BUILD_DATE"] ?? "2026-01-01T00:00:00Z";

/** Project-internal directory holding templates and scripts. */
export const PROJECT_DIR = ".specify";
export const TEMPLATES_DIR = `${PROJECT_DIR}/templates`;
export const SCRIPTS_DIR = `${PROJECT_DIR}/scripts`;

/** Asset bundle namespaces. */
export const TEMPLATE_CATEGORY = "templates";
export const SCRIPT_CATEGORY = "scripts";
export const COMMANDS_NAMESPACE = "commands";

export const INITIAL_COMMIT_MESSAGE = "Initial commit from Specify template";

/** Environment variable pointing at the user defaults file. */
export const CONFIG_ENV_VAR = "SPECIFY_CONFIG";
export const DEFAULT_CONFIG_FILE = ".specify.yaml";

export const TAGLINE = "Spec-Driven Development Toolkit";

export const BANNER = `
███████╗██████╗ ███████╗ ██████╗██╗███████╗██╗   ██╗
██╔════╝██╔══██╗██╔════╝██╔════╝██║██╔════╝╚██╗ ██╔╝
███████╗██████╔╝█████╗  ██║     ██║█████╗   ╚████╔╝
╚════██║██╔═══╝ ██╔══╝  ██║     ██║██╔══╝    ╚██╔╝
███████║██║     ███████╗╚██████╗██║██║        ██║
╚══════╝╚═╝     ╚══════╝ ╚═════╝╚═╝╚═╝        ╚═╝`;
