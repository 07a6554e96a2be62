export { OutputRenderer, type OutputSink } from './renderer';
