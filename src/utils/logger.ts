import pino from 'pino';
import { config, verifyConfig } from './config';

verifyConfig();

const logger = pino({
  timestamp: pino.stdTimeFunctions.isoTime,
  base: null, // no pid/hostname
  level: config.logLevel,
});

export default logger;
