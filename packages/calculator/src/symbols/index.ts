export { PREDEFINED_SYMBOLS, SymbolTable, type SymbolEntry, type Variable } from './symbol-table';
