export { WARMUP_MARKER, getSource, bodyOf, splitSource, specFromFunc } from './spec-builder.js';
