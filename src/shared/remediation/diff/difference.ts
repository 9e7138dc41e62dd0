import type { ConfigContainer, ConfigNode } from "../tree/ConfigNode"
import { ConfigTree } from "../tree/ConfigTree"

const ACL_PREFIXES = ["ip access-list ", "ipv4 access-list ", "ipv6 access-list "]

export interface DifferenceOptions {
	/** Lines starting with this prefix are skipped (default "no ") */
	negationPrefix?: string
}

/** "10 permit ip any any" -> "permit ip any any" */
export function stripAclSequenceNumber(text: string): string {
	const words = text.split(/\s+/)
	if (words.length > 1 && /^\d+$/.test(words[0])) {
		words.shift()
	}
	return words.join(" ")
}

/**
 * Lines of `config` that are absent from `other`, with the ancestors needed to
 * reach them. Negated and `default` lines are skipped; entries of access lists
 * are compared without their sequence numbers.
 */
export function difference(config: ConfigTree, other: ConfigTree, options: DifferenceOptions = {}): ConfigTree {
	const delta = new ConfigTree()
	differenceLevel(config, other, delta, options.negationPrefix ?? "no ", undefined)
	return delta
}

function differenceLevel(
	config: ConfigContainer,
	other: ConfigContainer,
	delta: ConfigContainer,
	negationPrefix: string,
	aclEntries: Map<string, ConfigNode> | undefined,
): void {
	for (const child of config.children) {
		if (child.text.startsWith(negationPrefix) || child.text.startsWith("default ")) {
			continue
		}

		const counterpart = aclEntries ? aclEntries.get(stripAclSequenceNumber(child.text)) : other.getChild(child.text)
		if (!counterpart) {
			delta.addDeepCopyOf(child)
			continue
		}

		const deltaChild = delta.addChild(child.text)
		const entries = ACL_PREFIXES.some((prefix) => child.text.startsWith(prefix))
			? new Map(counterpart.children.map((entry) => [stripAclSequenceNumber(entry.text), entry] as const))
			: undefined
		differenceLevel(child, counterpart, deltaChild, negationPrefix, entries)

		if (!deltaChild.hasChildren) {
			deltaChild.delete()
		}
	}
}
