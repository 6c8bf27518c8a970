export { CustomSet, SetCursor } from './set';
export type { Allocator, Equality, Logger, SetOptions } from './set';
export { filterOut, intersection, save, union } from './algebra';
export { describeFailure, err, ok } from './result';
export type { AllocationFailure, Err, Failure, IoFailure, Ok, RangeViolation, Result, SetFailure } from './result';
