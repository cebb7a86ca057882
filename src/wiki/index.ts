export { WikipediaClient, type WikipediaClientOptions } from './WikipediaClient.js';
export { RequestThrottle, type RequestThrottleConfig } from './RequestThrottle.js';
export { TITLE_RED_FLAGS, MAX_TITLE_LENGTH, isValidTitle, filterTitles } from './titles.js';
