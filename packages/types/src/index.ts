export * from "./matchRule"
export * from "./rules"
export * from "./driver"
export * from "./dump"
