export { RouteSet } from './route-set.js';
export type {
  RouteSetOptions,
  RouteSetState,
  GenerationResult,
  RecognitionResult,
  UrlParams,
} from './route-set.js';
export { Route, toParamString } from './route.js';
export type { UrlPart, UrlParts, GenerateOptions, RouteGeneration, GenerationKeyValues } from './route.js';
export { compilePattern, matchPattern, segmentNames, DEFAULT_SEGMENT_SOURCE, GLOB_SEGMENT_SOURCE } from './pattern-compiler.js';
export type { CompiledPattern, Segment, DynamicSegment, OptionalGroup } from './pattern-compiler.js';
export { indexNamedCaptures, pickCapture, countCaptures } from './named-captures.js';
export type { NamedCapturePattern, NamesDeclaration, CaptureNames } from './named-captures.js';
export { extractStaticSegments, extractStaticLiteral } from './static-segments.js';
export { KeyFrequencyAnalyzer } from './key-frequency.js';
export type { PossibleKeys } from './key-frequency.js';
export { GenerationGraph } from './generation-graph.js';
export type { KeyPath, GraphShape } from './generation-graph.js';
export {
  escapeUri,
  buildNestedQuery,
  reconstructPath,
  reconstructUrl,
  RequestProxy,
  DEFAULT_PORTS,
} from './url.js';
export { createRequestContext } from './request-context.js';
export type { CreateRequestContextOptions } from './request-context.js';
export { WaymarkError, PatternSyntaxError, RoutingError, RouteSetStateError } from './errors.js';
