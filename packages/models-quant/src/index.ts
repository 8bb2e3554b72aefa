export * from './linearAlgebra';
export * from './arima';
export * from './additive';
export * from './boostedTrees';
export * from './recurrent';
