/*
 * logger definition
 *
 * every level goes to stderr; stdout is reserved for the report.
 */

import * as W from 'winston'

const levels = Object.keys(W.config.npm.levels);

const log = W.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: W.format.combine(
    W.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    W.format.errors({
      stack: true
    }),
    W.format.json(),
  ),
  transports: [],
});

if (process.env.NODE_ENV === 'production') {
  log.add(new W.transports.Console({stderrLevels: levels}));
} else {
  log.add(new W.transports.Console({
    stderrLevels: levels,
    format: W.format.combine(
      W.format.colorize(),
      W.format.simple(),
    ),
  }));
}

export default log;
