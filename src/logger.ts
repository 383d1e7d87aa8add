import createDebug from "debug";

export const logger = {
  log: createDebug("tokenflow"),
  node: createDebug("tokenflow:node"),
  error: createDebug("tokenflow:error"),
};

// Pipe debug output to stdout instead of stderr
logger.log.log = console.debug.bind(console);
logger.node.log = console.debug.bind(console);

// Pipe error output to stderr
logger.error.log = console.error.bind(console);
