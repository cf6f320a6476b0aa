export { OutputRenderer } from './renderer';
