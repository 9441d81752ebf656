export { Result } from './result';
export { Row, valuesEqual, type ColumnMapper } from './row';
