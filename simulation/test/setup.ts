import { setLogLevel } from '../utils/log.js';

setLogLevel('silent');
