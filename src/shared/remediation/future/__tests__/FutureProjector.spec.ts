import { describe, it, expect } from "vitest"

import { compare } from "../../diff/Differ"
import { RuleSet } from "../../rules/RuleSet"
import { parseConfig } from "../../text/parse"
import { renderText } from "../../text/render"
import { FutureProjector, planSteps, predict, predictFromTarget, rollback } from "../FutureProjector"

const rules = RuleSet.fromDefinition({
	version: 1,
	platform: "test",
	indentation: 1,
	rules: [
		{ kind: "idempotent", match: [{ startsWith: "interface " }, { startsWith: "description " }] },
		{ kind: "idempotent", match: [{ startsWith: "hostname " }] },
		{ kind: "negate_with", match: [{ startsWith: "logging console " }], use: "logging console debugging" },
		{ kind: "sectional_overwrite", match: [{ startsWith: "route-policy " }] },
		{ kind: "sectional_overwrite_no_negate", match: [{ startsWith: "prefix-set " }] },
	],
})

function tree(...lines: string[]) {
	return parseConfig(lines.join("\n"), rules)
}

describe("FutureProjector", () => {
	it("should replace idempotent lines in place and keep untouched lines", () => {
		const running = tree("hostname r1", "interface Vlan2", " description old", " mtu 9000")
		const target = tree("hostname r2", "interface Vlan2", " description new", " mtu 9000")

		const future = predictFromTarget(running, target, rules)

		expect(renderText(future, { indentation: 1 })).toBe(
			["hostname r2", "interface Vlan2", " description new", " mtu 9000"].join("\n"),
		)
		expect(future.equals(target)).toBe(true)
	})

	it("should drop removed sections", () => {
		const running = tree("hostname r1", "interface Vlan9", " shutdown", "ntp server 10.0.0.1")
		const target = tree("hostname r1", "ntp server 10.0.0.1")

		const future = predict(running, compare(running, target, rules), rules)

		expect(renderText(future)).toBe("hostname r1\nntp server 10.0.0.1")
		expect(future.equals(target)).toBe(true)
	})

	it("should let a negation cancel the line it negates", () => {
		const running = tree("interface Vlan2", " shutdown", " mtu 9000")
		const remediation = tree("interface Vlan2", " no shutdown")

		const future = predict(running, remediation, rules)

		expect(renderText(future, { indentation: 1 })).toBe("interface Vlan2\n mtu 9000")
	})

	it("should keep a negation that has nothing to negate", () => {
		const running = tree("interface Vlan2", " mtu 9000")
		const remediation = tree("interface Vlan2", " no ip redirects")

		const future = predict(running, remediation, rules)

		expect(future.find(["interface Vlan2"])?.children.map((child) => child.text)).toEqual([
			"no ip redirects",
			"mtu 9000",
		])
	})

	it("should treat a default line as removing its base line", () => {
		const running = tree("interface Vlan2", " logging event link-status")
		const remediation = tree("interface Vlan2", " default logging event link-status")

		const future = predict(running, remediation, rules)

		expect(renderText(future)).toBe("interface Vlan2")
	})

	it("should consume a running line removed through its negate_with literal", () => {
		const running = tree("logging console informational", "hostname r1")
		const target = tree("hostname r1")

		const future = predictFromTarget(running, target, rules)

		expect(renderText(future)).toBe("hostname r1")
	})

	it("should replace an overwritten section wholesale", () => {
		const running = tree("route-policy EDGE", " if destination in BOGONS then", "  drop", " endif", " pass")
		const target = tree("route-policy EDGE", " if destination in MARTIANS then", "  drop", " endif", " pass")

		const future = predictFromTarget(running, target, rules)

		expect(renderText(future, { indentation: 1 })).toBe(
			["route-policy EDGE", " if destination in MARTIANS then", "  drop", " endif", " pass"].join("\n"),
		)
		expect(future.equals(target)).toBe(true)
	})

	it("should reach a target that empties an overwritten section", () => {
		const cases = [
			[tree("prefix-set BOGONS", " 10.0.0.0/8", "hostname r1"), tree("prefix-set BOGONS", "hostname r1")],
			[tree("route-policy EDGE", " pass", "hostname r1"), tree("route-policy EDGE", "hostname r1")],
		]

		for (const [running, target] of cases) {
			const future = predict(running, compare(running, target, rules), rules)

			expect(future.equals(target)).toBe(true)
		}
	})

	it("should keep a running line the target still holds when another of its class is added", () => {
		const running = tree("interface Vlan2", " description a")
		const target = tree("interface Vlan2", " description a", " description b")

		const future = predictFromTarget(running, target, rules)

		expect(future.find(["interface Vlan2"])?.children.map((child) => child.text)).toEqual([
			"description b",
			"description a",
		])
		expect(future.equals(target)).toBe(true)
	})

	it("should fill a single free slot from a hand-written remediation", () => {
		const future = predict(tree("hostname r1", "ntp server 10.0.0.1"), tree("hostname r2"), rules)

		expect(renderText(future)).toBe("hostname r2\nntp server 10.0.0.1")
	})

	it("should keep the removals' result when an idempotent slot is ambiguous", () => {
		const running = tree("interface Vlan2", " description a", " description b")
		const target = tree("interface Vlan2", " description c")

		const future = predictFromTarget(running, target, rules)

		expect(future.find(["interface Vlan2"])?.children.map((child) => child.text)).toEqual(["description c"])
	})

	it("should leave running and remediation untouched", () => {
		const running = tree("hostname r1", "interface Vlan2", " description old")
		const target = tree("hostname r2", "interface Vlan2", " description new")
		const remediation = compare(running, target, rules)
		const runningBefore = renderText(running)
		const remediationBefore = renderText(remediation, { comments: true })

		new FutureProjector(rules).predict(running, remediation)

		expect(renderText(running)).toBe(runningBefore)
		expect(renderText(remediation, { comments: true })).toBe(remediationBefore)
	})

	describe("rollback", () => {
		it("should return the remediation that restores the running config", () => {
			const running = tree("hostname r1", "interface Vlan2", " description old", " mtu 9000")
			const target = tree("hostname r2", "interface Vlan2", " description new", " mtu 9000")
			const future = predictFromTarget(running, target, rules)

			const back = rollback(future, running, rules)

			expect(renderText(back, { indentation: 1 })).toBe(
				["hostname r1", "interface Vlan2", " description old"].join("\n"),
			)
			expect(predict(future, back, rules).equals(running)).toBe(true)
		})
	})

	describe("planSteps", () => {
		it("should chain each step's prediction into the next", () => {
			const running = tree("hostname r1")
			const targets = [tree("hostname r2"), tree("hostname r2", "ntp server 10.0.0.1")]

			const steps = planSteps(running, targets, rules)

			expect(steps.map((step) => step.index)).toEqual([0, 1])
			expect(renderText(steps[0].remediation)).toBe("hostname r2")
			expect(renderText(steps[0].predicted)).toBe("hostname r2")
			expect(renderText(steps[0].rollback)).toBe("hostname r1")
			expect(renderText(steps[1].remediation)).toBe("ntp server 10.0.0.1")
			expect(renderText(steps[1].predicted)).toBe("ntp server 10.0.0.1\nhostname r2")
			expect(renderText(steps[1].rollback)).toBe("no ntp server 10.0.0.1")
			expect(steps[1].predicted.equals(targets[1])).toBe(true)
		})

		it("should return no steps for an empty plan", () => {
			expect(planSteps(tree("hostname r1"), [], rules)).toEqual([])
		})
	})
})
