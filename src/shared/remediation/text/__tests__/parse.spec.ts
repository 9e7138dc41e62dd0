import { describe, it, expect } from "vitest"

import { InvalidRangeError } from "../../errors"
import { RuleSet } from "../../rules/RuleSet"
import { convertToSetCommands, expandRange, parseConfig, tokenizeLines } from "../parse"

describe("tokenizeLines", () => {
	it("should nest deeper lines and pop back on shallower ones", () => {
		const entries = [...tokenizeLines(["a", "  b", "    c", "  d", "e"])]

		expect(entries).toEqual([
			{ depth: 1, text: "a" },
			{ depth: 2, text: "b" },
			{ depth: 3, text: "c" },
			{ depth: 2, text: "d" },
			{ depth: 1, text: "e" },
		])
	})

	it("should attach a line to the nearest shallower open level", () => {
		const entries = [...tokenizeLines(["a", "   b", " c"])]

		expect(entries.map((entry) => entry.depth)).toEqual([1, 2, 2])
	})

	it("should drop blank and comment lines and trailing whitespace", () => {
		const entries = [...tokenizeLines(["!", "hostname r1   ", "", "interface Vlan2", " ! uplink", " mtu 9000"])]

		expect(entries).toEqual([
			{ depth: 1, text: "hostname r1" },
			{ depth: 1, text: "interface Vlan2" },
			{ depth: 2, text: "mtu 9000" },
		])
	})

	it("should apply per-line substitutions before measuring", () => {
		const rules = RuleSet.fromDefinition({
			version: 1,
			platform: "test",
			perLineSub: [
				{ search: "^Building configuration.*", replace: "" },
				{ search: "^(\\s*)descripton ", replace: "$1description " },
			],
		})

		const lines = ["Building configuration...", "interface Vlan2", " descripton uplink"]

		const entries = [...tokenizeLines(lines, rules)]

		expect(entries).toEqual([
			{ depth: 1, text: "interface Vlan2" },
			{ depth: 2, text: "description uplink" },
		])
	})
})

describe("parseConfig", () => {
	it("should split CRLF text", () => {
		const tree = parseConfig("interface Vlan2\r\n  mtu 9000\r\nhostname r1\r\n")

		expect(tree.children.map((child) => child.text)).toEqual(["interface Vlan2", "hostname r1"])
		expect(tree.find(["interface Vlan2", "mtu 9000"])?.depth).toBe(2)
	})

	it("should apply full-text substitutions across lines", () => {
		const rules = RuleSet.fromDefinition({
			version: 1,
			platform: "test",
			fullTextSub: [{ search: "^interface Gi", replace: "interface GigabitEthernet" }],
		})

		const tree = parseConfig("interface Gi0/1\n description a\ninterface Gi0/2\n description b", rules)

		expect(tree.children.map((child) => child.text)).toEqual([
			"interface GigabitEthernet0/1",
			"interface GigabitEthernet0/2",
		])
	})

	it("should merge repeated sibling texts by default", () => {
		const tree = parseConfig("interface Vlan2\n  mtu 9000\ninterface Vlan2\n  no shutdown")

		expect(tree.children).toHaveLength(1)
		expect(tree.children[0].children.map((child) => child.text)).toEqual(["mtu 9000", "no shutdown"])
	})

	it("should keep repeated children where a rule allows them", () => {
		const rules = RuleSet.fromDefinition({
			version: 1,
			platform: "test",
			rules: [{ kind: "duplicate_child_allowed", match: [{ startsWith: "route-policy " }] }],
		})

		const tree = parseConfig("route-policy EDGE\n  endif\n  pass\n  endif", rules)

		expect(tree.children[0].children.map((child) => child.text)).toEqual(["endif", "pass", "endif"])
	})
})

describe("convertToSetCommands", () => {
	it("should flatten braces into set commands", () => {
		const text = [
			"system {",
			"    host-name r1;",
			"    services {",
			"        ssh;",
			"    }",
			"}",
			"set interfaces ge-0/0/0 unit 0",
		].join("\n")

		expect(convertToSetCommands(text)).toBe(
			["set system host-name r1", "set system services ssh", "set interfaces ge-0/0/0 unit 0"].join("\n"),
		)
	})
})

describe("expandRange", () => {
	it("should expand ranges and single numbers in the order listed", () => {
		expect(expandRange("22-24,2-5,8")).toEqual([22, 23, 24, 2, 3, 4, 5, 8])
	})

	it("should reject parts that are not numbers or pairs", () => {
		expect(() => expandRange("2-x")).toThrow(InvalidRangeError)
		expect(() => expandRange("1-2-3")).toThrow("Invalid range '1-2-3': '1-2-3' is not a number or a start-stop pair.")
	})

	it("should reject a range that ends before it starts", () => {
		expect(() => expandRange("5-3")).toThrow("Invalid range '5-3': '5-3' ends before it starts.")
	})

	it("should reject numbers listed twice", () => {
		expect(() => expandRange("1-3,2")).toThrow("Invalid range '1-3,2': a number is listed more than once.")
	})
})
