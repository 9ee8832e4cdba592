import { configureLogger } from '../src/core/Logger.js';

configureLogger({ level: 'silent', pretty: false });
