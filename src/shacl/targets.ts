// src/shacl/targets.ts
import type { Graph } from '../rdf/graph';
import { isSubjectTerm, Term, termToString } from '../rdf/terms';
import { RDF } from '../rdf/vocabulary';
import type { NodeShape } from './model/nodeShape';

// Kinds of SHACL targets
export enum ShaclTargetType {
    NODE = 'sh:targetNode',
    CLASS = 'sh:targetClass',
    SUBJECTS_OF = 'sh:targetSubjectsOf',
    OBJECTS_OF = 'sh:targetObjectsOf',
    IMPLICIT_CLASS = 'implicit_class' // shapes that are classes themselves
}

export interface ShapeTarget {
    type: ShaclTargetType;
    value: Term;
}

/**
 * Extract targets from a node shape
 */
export function extractShapeTargets(shape: NodeShape): ShapeTarget[] {
    const targets: ShapeTarget[] = [
        ...shape.targetClasses.map(value => ({ type: ShaclTargetType.CLASS, value })),
        ...shape.targetNodes.map(value => ({ type: ShaclTargetType.NODE, value })),
        ...shape.targetSubjectsOf.map(value => ({ type: ShaclTargetType.SUBJECTS_OF, value })),
        ...shape.targetObjectsOf.map(value => ({ type: ShaclTargetType.OBJECTS_OF, value })),
    ];
    if (shape.implicitClassTarget) {
        targets.push({ type: ShaclTargetType.IMPLICIT_CLASS, value: shape.implicitClassTarget });
    }
    return targets;
}

/**
 * Find focus nodes in the data graph based on targets, in target order without duplicates
 */
export function findFocusNodes(dataGraph: Graph, targets: readonly ShapeTarget[]): Term[] {
    const focusNodes = new Map<string, Term>();
    const add = (node: Term): void => {
        const key = termToString(node);
        if (!focusNodes.has(key)) {
            focusNodes.set(key, node);
        }
    };

    for (const target of targets) {
        switch (target.type) {
            case ShaclTargetType.NODE:
                add(target.value);
                break;

            case ShaclTargetType.CLASS:
            case ShaclTargetType.IMPLICIT_CLASS:
                dataGraph.subjects(RDF.type, target.value).forEach(add);
                break;

            case ShaclTargetType.SUBJECTS_OF:
                if (target.value.termType === 'NamedNode') {
                    dataGraph.subjects(target.value).forEach(add);
                }
                break;

            case ShaclTargetType.OBJECTS_OF:
                if (target.value.termType === 'NamedNode') {
                    dataGraph.triplesWith(null, target.value)
                        .map(triple => triple.object)
                        .filter(isSubjectTerm)
                        .forEach(add);
                }
                break;
        }
    }

    return Array.from(focusNodes.values());
}

export function resolveFocusNodes(dataGraph: Graph, shape: NodeShape): Term[] {
    return findFocusNodes(dataGraph, extractShapeTargets(shape));
}
