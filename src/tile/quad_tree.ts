/**
 * Walks a quad-tree top-down without materialising it. Nodes for which
 * `refine` returns true are passed to `visit`, which returns their children;
 * all other nodes are leaves. The walk is depth-first: a node's subtree is
 * finished before its next sibling is entered.
 *
 * @param root - node to start from
 * @param refine - decides whether a node needs subdividing
 * @param visit - called once per inner node, returns its children
 * @returns the leaves, in depth-first order
 */
export function onTheFlyTraverse<Node>(root: Node, refine: (node: Node) => boolean, visit: (node: Node) => ReadonlyArray<Node>): Node[] {
    const leaves: Node[] = [];
    const stack: Node[] = [root];

    while (stack.length > 0) {
        const node = stack.pop();
        if (node === undefined) break;

        if (!refine(node)) {
            leaves.push(node);
            continue;
        }

        const children = visit(node);
        for (let i = children.length - 1; i >= 0; i--) {
            stack.push(children[i]);
        }
    }

    return leaves;
}
