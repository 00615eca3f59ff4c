export { log, logLevel, resolveLogLevel } from './logging.js';
export {
  printInfo,
  printSuccess,
  printWarning,
  printError,
  printProgress
} from './terminal-output.js';
