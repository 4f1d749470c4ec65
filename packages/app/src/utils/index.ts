export { ANSI, useColor } from './terminal';
