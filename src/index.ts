export { StreamingJsonParser, parseJson } from './parser.js';
export { JsonSnapshotStream, calculateDelta } from './stream.js';
export { StreamSyntaxError, InvalidOptionsError } from './errors.js';
export { EXPECTED_CHARS, type State } from './core/statemachine.js';
export {
    ParserOptionsSchema,
    StreamOptionsSchema,
    CliOptionsSchema,
    type ParserOptions,
    type StreamOptions,
    type CliOptions,
} from './options.js';
export {
    META,
    PENDING,
    isPending,
    pendingAt,
    type JsonSnapshot,
    type PendingNode,
    type MetaInfo,
    type DeepPartial,
    type ParseResult,
} from './types.js';
