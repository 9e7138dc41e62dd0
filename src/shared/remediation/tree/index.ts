export { ConfigContainer, ConfigNode, type AddChildOptions, type CopyOptions } from "./ConfigNode"
export { ConfigTree, type ConfigEntry, type FromEntriesOptions } from "./ConfigTree"
