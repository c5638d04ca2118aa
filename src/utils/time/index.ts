export { createNodeTimer } from './time';
