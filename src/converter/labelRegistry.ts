/**
 * Label registry
 *
 * Maps `namespace:key` to the LaTeX label declared for it. One registry
 * lives in each BuildContext; entries are never removed during a build.
 */

import { LABEL_NAMESPACES } from './types';
import type { Label, LabelNamespace } from './types';

export interface DeclareResult {
    label: Label;
    /** The label this declaration replaced, if any */
    previous?: Label;
}

export function isLabelNamespace(value: string): value is LabelNamespace {
    return LABEL_NAMESPACES.some(ns => ns === value);
}

/**
 * Split `fig:overview` into namespace and key. Returns undefined when
 * the prefix is not a known namespace.
 */
export function parseLabelId(id: string): { namespace: LabelNamespace; key: string } | undefined {
    const colon = id.indexOf(':');
    if (colon <= 0) return undefined;
    const namespace = id.slice(0, colon);
    const key = id.slice(colon + 1);
    if (!key || !isLabelNamespace(namespace)) return undefined;
    return { namespace, key };
}

export class LabelRegistry {
    private labels: Map<string, Label> = new Map();

    /**
     * Record a declaration. A redeclaration overwrites the earlier one;
     * the caller reports it.
     */
    declare(namespace: LabelNamespace, key: string): DeclareResult {
        const target = `${namespace}:${key}`;
        const label: Label = { namespace, key, target };
        const previous = this.labels.get(target);
        this.labels.set(target, label);
        return previous ? { label, previous } : { label };
    }

    resolve(namespace: LabelNamespace, key: string): Label | undefined {
        return this.labels.get(`${namespace}:${key}`);
    }

    has(namespace: LabelNamespace, key: string): boolean {
        return this.labels.has(`${namespace}:${key}`);
    }

    /**
     * Declared labels in declaration order
     */
    all(): Label[] {
        return [...this.labels.values()];
    }

    get size(): number {
        return this.labels.size;
    }
}
