export * from "./core/attr-value.js"
export * from "./core/decode.js"
export * from "./core/filter.js"
export * from "./core/infer.js"
export * from "./core/path.js"
export * from "./core/render.js"
export * from "./core/sort.js"
export * from "./core/user.js"
