export { RangeParser } from './RangeParser';
export { RangeResponseBuilder } from './RangeResponseBuilder';
export type { ResponseHeaders } from './RangeResponseBuilder';
export { readFileRange } from './readFileRange';
