export { ImmutableObject, type DeepCloneable } from './immutable-object.js';
export { ImmutableList } from './immutable-list.js';
