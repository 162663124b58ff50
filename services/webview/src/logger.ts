import pino from 'pino';
import { config } from './config';

export const logger = pino({ name: 'backlog-webview', level: config.logLevel });
