export { compileMatcher, lineageMatches, textMatches, type CompiledMatcher } from "./matcher"
export {
	RuleSet,
	type Rule,
	type RuleOfKind,
	type RuleSetResult,
	type RuleTarget,
	type Substitution,
	type TagRule,
} from "./RuleSet"
