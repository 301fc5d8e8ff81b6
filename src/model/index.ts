export {
  BaseModel,
  ModelInstance,
  defineBaseModel,
  type BaseModelOptions,
  type ColumnValue,
  type ModelInit,
  type ModelValues,
} from './base-model.js'
export {
  AsyncModel,
  AsyncModelInstance,
  defineModel,
  type AsyncModelOptions,
  type AsyncModelExtendOptions,
  type GetOptions,
  type GetOneOptions,
  type InstanceState,
  type ModelFilters,
} from './async-model.js'
