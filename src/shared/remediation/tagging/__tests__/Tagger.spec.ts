import { describe, it, expect } from "vitest"

import { compare } from "../../diff/Differ"
import { RemediationTree } from "../../diff/RemediationTree"
import { RuleSet } from "../../rules/RuleSet"
import { parseConfig } from "../../text/parse"
import { renderText } from "../../text/render"
import { applyTags, filterByTag, filterByTags, lineIncluded, Tagger } from "../Tagger"

const rules = RuleSet.fromDefinition({
	version: 1,
	platform: "test",
	tags: [
		{ match: [{ startsWith: "interface " }], apply: ["interfaces"] },
		{ match: [{ startsWith: "interface " }, { startsWith: "description " }], apply: ["descriptions"] },
		{ match: [{ startsWith: "ntp " }], apply: ["management"] },
	],
})

const config = parseConfig(
	["hostname r1", "interface Vlan2", "  description uplink", "  mtu 9000", "ntp server 10.0.0.1"].join("\n"),
)

function tagsAt(tree: { find(path: string[]): { tags: Set<string> } | undefined }, ...path: string[]) {
	return [...(tree.find(path)?.tags ?? [])].sort()
}

describe("Tagger", () => {
	describe("applyTags", () => {
		it("should tag matching lines and their descendants on a copy", () => {
			const tagged = applyTags(config, rules)

			expect(tagsAt(tagged, "hostname r1")).toEqual([])
			expect(tagsAt(tagged, "interface Vlan2")).toEqual(["interfaces"])
			expect(tagsAt(tagged, "interface Vlan2", "description uplink")).toEqual(["descriptions", "interfaces"])
			expect(tagsAt(tagged, "interface Vlan2", "mtu 9000")).toEqual(["interfaces"])
			expect(tagsAt(tagged, "ntp server 10.0.0.1")).toEqual(["management"])
			expect(tagsAt(config, "interface Vlan2")).toEqual([])
		})

		it("should tag a line exactly when some ancestor path matches a rule", () => {
			const tagged = applyTags(config, rules)

			for (const node of tagged.allNodes()) {
				const underInterface = node.lineage().some((line) => line.text.startsWith("interface "))
				expect(node.tags.has("interfaces")).toBe(underInterface)
			}
		})

		it("should accept a plain list of tag rules", () => {
			const tagged = new Tagger(rules.tagRules).apply(config)

			expect(tagsAt(tagged, "ntp server 10.0.0.1")).toEqual(["management"])
		})

		it("should keep a remediation a remediation", () => {
			const running = parseConfig("interface Vlan2\n  mtu 1500")
			const target = parseConfig("interface Vlan2\n  mtu 9000\nntp server 10.0.0.1")

			const tagged = new Tagger(rules).apply(compare(running, target))

			expect(tagged).toBeInstanceOf(RemediationTree)
			expect(tagged.find(["interface Vlan2", "mtu 9000"])?.operation).toBe("add")
			expect(tagsAt(tagged, "interface Vlan2", "no mtu 1500")).toEqual(["interfaces"])
		})
	})

	describe("filterByTag", () => {
		it("should keep tagged lines with their ancestors in order", () => {
			const tagged = applyTags(config, rules)

			expect(renderText(filterByTag(tagged, "descriptions"))).toBe("interface Vlan2\n  description uplink")
			expect(renderText(filterByTag(tagged, "management"))).toBe("ntp server 10.0.0.1")
			expect(filterByTag(tagged, "unknown").hasChildren).toBe(false)
		})
	})

	describe("filterByTags", () => {
		it("should apply exclude tags after include tags", () => {
			const tagged = applyTags(config, rules)

			const result = filterByTags(tagged, { include: ["interfaces"], exclude: ["descriptions"] })

			expect(renderText(result)).toBe("interface Vlan2\n  mtu 9000")
		})

		it("should keep every line without an exclude tag when no include tags are given", () => {
			const tagged = applyTags(config, rules)

			const result = filterByTags(tagged, { exclude: ["management"] })

			expect(renderText(result)).toBe(
				["hostname r1", "interface Vlan2", "  description uplink", "  mtu 9000"].join("\n"),
			)
		})

		it("should keep nothing without include or exclude tags", () => {
			expect(filterByTags(applyTags(config, rules), {}).hasChildren).toBe(false)
		})
	})

	describe("lineIncluded", () => {
		it("should follow the include/exclude test", () => {
			const tags = new Set(["a", "b"])

			expect(lineIncluded(tags, { include: ["a"] })).toBe(true)
			expect(lineIncluded(tags, { include: ["c"] })).toBe(false)
			expect(lineIncluded(tags, { include: ["a"], exclude: ["b"] })).toBe(false)
			expect(lineIncluded(tags, { exclude: ["c"] })).toBe(true)
			expect(lineIncluded(new Set<string>(), { exclude: ["c"] })).toBe(true)
			expect(lineIncluded(tags, {})).toBe(false)
		})
	})
})
