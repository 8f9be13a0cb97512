export const TYPE_METADATA = "wiregraph:type";
export const INJECT_METADATA = "wiregraph:inject";
export const METHOD_PARAMS_METADATA = "wiregraph:method-params";
export const FUNCTION_PARAMS_METADATA = "wiregraph:function-params";

// Emitted by TypeScript for decorated classes under emitDecoratorMetadata.
export const DESIGN_PARAMTYPES = "design:paramtypes";
