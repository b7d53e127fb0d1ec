export class Node {
    readonly info: number;
    next: Node | null;

    constructor(info: number) {
        this.info = info;
        this.next = null;
    }
}

export class SortedLinkedList {
    head: Node | null;
    size: number;

    constructor() {
        this.head = null;
        this.size = 0;
    }

    static from(values: Iterable<number>): SortedLinkedList {
        const list = new SortedLinkedList();
        for (const value of values) {
            list.insert(value);
        }
        return list;
    }

    insert(info: number): Node {
        if (!Number.isInteger(info)) throw new RangeError(`Cannot insert non-integer value: ${info}`);

        const newNode = new Node(info);

        if (!this.head || info < this.head.info) {
            newNode.next = this.head;
            this.head = newNode;
        } else {
            //walk past every node <= info so duplicates keep their insertion order
            let current = this.head;
            while (current.next && current.next.info <= info) {
                current = current.next;
            }
            newNode.next = current.next;
            current.next = newNode;
        }

        this.size++;
        return newNode;
    }

    countPositive(): number {
        let count = 0;
        let current = this.head;

        while (current) {
            if (current.info > 0) {
                count++;
            }
            current = current.next;
        }

        return count;
    }

    isEmpty(): boolean {
        return this.head === null;
    }

    *nodes(): Generator<Node> {
        let current = this.head;
        while (current) {
            yield current;
            current = current.next;
        }
    }

    *values(): Generator<number> {
        for (const node of this.nodes()) {
            yield node.info;
        }
    }

    [Symbol.iterator](): Iterator<number> {
        return this.values();
    }

    toArray(): number[] {
        return Array.from(this.values());
    }
}
