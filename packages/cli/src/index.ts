/**
 * tracegraph CLI Package
 */

export { createProgram, CLI_VERSION } from './program.js';
export {
  runInspect,
  runList,
  runReplay,
  buildSummary,
  consoleIO,
  type CommandIO,
  type InspectOptions,
  type ReplayCommandOptions,
  type TraceSummary,
} from './commands.js';
export {
  renderTrace,
  statusIcon,
  VERBOSITY_LEVELS,
  type RenderOptions,
  type Verbosity,
} from './render.js';
