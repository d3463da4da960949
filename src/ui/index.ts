export { TerminalUI, type TerminalUIOptions, type ColorName } from './terminal';
