export { Column, column, type ColumnOptions, type ColumnDefault } from './column.js'
export { ColumnType, Types, customType, type ArrayTypeOptions } from './column-type.js'
