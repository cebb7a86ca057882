/**
 * Services module exports
 */
export { WikiRacer, type WikiRacerOptions } from './WikiRacer.js';
