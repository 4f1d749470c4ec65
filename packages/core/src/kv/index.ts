export { parseLiteral } from './literal';
export { type KvInput, parseKv, rawParamsText } from './parse-kv';
export { tokenize } from './tokenize';
