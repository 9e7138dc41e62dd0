export { Differ, compare } from "./Differ"
export { RemediationTree } from "./RemediationTree"
export { negationFor, swapNegation, type Negation, type NegationSource } from "./negation"
export { difference, stripAclSequenceNumber, type DifferenceOptions } from "./difference"
export { unifiedDiff } from "./unifiedDiff"
