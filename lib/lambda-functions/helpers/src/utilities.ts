import { LogMessage, logModes } from "./interfaces";

const logLevels: Record<logModes, number> = {
  [logModes.Debug]: 0,
  [logModes.Info]: 1,
  [logModes.Warn]: 2,
  [logModes.Exception]: 3,
};

const isLogMode = (value: string): value is logModes =>
  Object.values<string>(logModes).includes(value);

/**
 * Custom logger utility that writes one JSON line per log message.
 *
 * - If the function log level is debug, then all debug, info, warn and exception
 *   logs are processed.
 * - If the function log level is info, then all info, warn and exception logs are
 *   processed.
 * - If the function log level is warn, then all warn and exception logs are processed.
 * - If the function log level is exception then all exception logs are processed.
 * - If no (or an unknown) function log level is passed, then all logs are processed
 *
 * @param logMessage Raw log message
 * @param functionLogMode Function logging configuration as read from buildConfig
 */
export function logger(logMessage: LogMessage, functionLogMode?: string) {
  if (
    functionLogMode === undefined ||
    !isLogMode(functionLogMode) ||
    logLevels[logMessage.logMode] >= logLevels[functionLogMode]
  ) {
    console.log(JSON.stringify(logMessage));
  }
}

export const constructExceptionMessageforLogger = (
  requestId: string,
  name: string,
  message: string,
  relatedData: string
) => {
  return `Exception ${name} occurred for request ${requestId}. Exception message is -> ${message} . Related data for the exception -> ${relatedData}`;
};
