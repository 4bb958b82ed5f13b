import { assertValue } from "@streetnav/shared/assert"

interface HeapEntry {
	key: string
	priority: number
	/** Insertion counter, last resort tie-break. */
	seq: number
}

/**
 * Min-heap priority queue of node keys for pathfinding.
 *
 * Entries are ordered by ascending priority, then by key, then by insertion
 * order. Keys compare with `<`, i.e. by UTF-16 code unit, which differs from
 * code point order only for keys holding characters beyond U+FFFF.
 *
 * A key may be pushed more than once; every push is a separate entry and the
 * search discards the stale ones when they are popped.
 */
export class BinaryHeap {
	private entries: HeapEntry[] = []
	private counter = 0

	get size(): number {
		return this.entries.length
	}

	/**
	 * Add a key with the given priority.
	 */
	push(key: string, priority: number): void {
		this.entries.push({ key, priority, seq: this.counter++ })
		this.bubbleUp(this.entries.length - 1)
	}

	/**
	 * Remove and return the minimum entry's key.
	 */
	pop(): string | undefined {
		const min = this.entries[0]
		if (min === undefined) return undefined

		const last = this.entries.pop()
		if (last !== undefined && this.entries.length > 0) {
			this.entries[0] = last
			this.bubbleDown(0)
		}

		return min.key
	}

	private at(index: number): HeapEntry {
		const entry = this.entries[index]
		assertValue(entry, `Heap index ${index} out of range`)
		return entry
	}

	private bubbleUp(startIndex: number): void {
		const item = this.at(startIndex)
		let index = startIndex

		while (index > 0) {
			const parentIndex = (index - 1) >> 1
			const parent = this.at(parentIndex)

			if (!precedes(item, parent)) break

			this.entries[index] = parent
			index = parentIndex
		}

		this.entries[index] = item
	}

	private bubbleDown(startIndex: number): void {
		const length = this.entries.length
		const item = this.at(startIndex)
		let index = startIndex

		while (true) {
			const leftIndex = (index << 1) + 1
			const rightIndex = leftIndex + 1
			let smallest = index
			let smallestEntry = item

			if (leftIndex < length) {
				const left = this.at(leftIndex)
				if (precedes(left, smallestEntry)) {
					smallest = leftIndex
					smallestEntry = left
				}
			}

			if (rightIndex < length) {
				const right = this.at(rightIndex)
				if (precedes(right, smallestEntry)) {
					smallest = rightIndex
					smallestEntry = right
				}
			}

			if (smallest === index) break

			this.entries[index] = smallestEntry
			index = smallest
		}

		this.entries[index] = item
	}
}

/** Whether `a` must be popped before `b`. */
function precedes(a: HeapEntry, b: HeapEntry): boolean {
	if (a.priority !== b.priority) return a.priority < b.priority
	if (a.key !== b.key) return a.key < b.key
	return a.seq < b.seq
}
