export { unquoteString, unquoteAny, unquotePayload, type Unquotable } from './unquote.js';
