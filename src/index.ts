/* eslint-disable no-restricted-syntax */
export { symbolic, type Bindings, type StringifyOptions, term, factor, addTerms, mulFactors, termAsSymbolic, factorAsSymbolic, structuralEquals, isIndeterminate, isDerivativeMarker } from './symbolic';
export { type ExpansionSpec, expansion, validateSpec, maxOrder } from './expansion';
export { ExpansionPointError, DivergentExpansionError } from './errors';
export { checkPoints } from './singularity';
export { search, type Equality } from './search';
export { diffExpand } from './diffExpand';
export { expand, tryExpand, type SeriesOptions, setDefaultSeriesOptions, getDefaultSeriesOptions, setTraceLogging } from './taylor';
