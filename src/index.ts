/**
 * @since 0.1.0
 */
export * from "./Declaration.js"
export * from "./Codecs.js"
export * from "./Errors.js"
export * from "./RecordErrors.js"
export * from "./Layout.js"
export * from "./Validator.js"
export * from "./Offsets.js"
export * from "./Dispatcher.js"
export * from "./CompilerConfig.js"
export * from "./Compiler.js"
export * from "./Records.js"
