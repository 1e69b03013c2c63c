// src/shacl/validators/type.ts
import type { Graph } from '../../rdf/graph';
import type { Term } from '../../rdf/terms';
import { SH } from '../../rdf/vocabulary';
import type { NodeShape } from '../model/nodeShape';
import type { PropertyShape } from '../model/propertyShape';
import type { ValidationResult } from '../model/validationResult';
import {
    buildNodeViolation,
    buildViolation,
    describeTerm,
    getPropertyValues,
    isDatatype,
    isInstanceOf,
    isNodeKind,
} from './helpers';

/**
 * sh:datatype, sh:class and sh:nodeKind on every value of the property.
 * The checks are independent, so one value can produce several results.
 */
export function validate(graph: Graph, focusNode: Term, shape: PropertyShape): ValidationResult[] {
    const results: ValidationResult[] = [];
    const values = getPropertyValues(graph, focusNode, shape.path);

    if (shape.datatype) {
        const datatype = shape.datatype;
        for (const value of values) {
            if (!isDatatype(value, datatype)) {
                results.push(buildViolation(focusNode, shape,
                    `Value does not have required datatype ${describeTerm(datatype)}`, {
                        constraintComponent: SH.DatatypeConstraintComponent,
                        value,
                        expectedDatatype: datatype,
                        actualValue: value,
                    }));
            }
        }
    }

    if (shape.class) {
        const classIri = shape.class;
        for (const value of values) {
            if (!isInstanceOf(graph, value, classIri)) {
                results.push(buildViolation(focusNode, shape,
                    `Value is not an instance of class ${describeTerm(classIri)}`, {
                        constraintComponent: SH.ClassConstraintComponent,
                        value,
                        expectedClass: classIri,
                        actualValue: value,
                    }));
            }
        }
    }

    if (shape.nodeKind) {
        const nodeKind = shape.nodeKind;
        for (const value of values) {
            if (!isNodeKind(value, nodeKind)) {
                results.push(buildViolation(focusNode, shape,
                    `Value does not match required node kind ${nodeKind}`, {
                        constraintComponent: SH.NodeKindConstraintComponent,
                        value,
                        expectedNodeKind: nodeKind,
                        actualValue: value,
                    }));
            }
        }
    }

    return results;
}

/**
 * The same checks applied to the focus node itself
 */
export function validateNode(graph: Graph, focusNode: Term, shape: NodeShape): ValidationResult[] {
    const results: ValidationResult[] = [];

    if (shape.datatype && !isDatatype(focusNode, shape.datatype)) {
        results.push(buildNodeViolation(focusNode, shape,
            `Focus node does not have required datatype ${describeTerm(shape.datatype)}`, {
                constraintComponent: SH.DatatypeConstraintComponent,
                value: focusNode,
                expectedDatatype: shape.datatype,
                actualValue: focusNode,
            }));
    }

    if (shape.class && !isInstanceOf(graph, focusNode, shape.class)) {
        results.push(buildNodeViolation(focusNode, shape,
            `Focus node is not an instance of class ${describeTerm(shape.class)}`, {
                constraintComponent: SH.ClassConstraintComponent,
                value: focusNode,
                expectedClass: shape.class,
                actualValue: focusNode,
            }));
    }

    if (shape.nodeKind && !isNodeKind(focusNode, shape.nodeKind)) {
        results.push(buildNodeViolation(focusNode, shape,
            `Focus node does not match required node kind ${shape.nodeKind}`, {
                constraintComponent: SH.NodeKindConstraintComponent,
                value: focusNode,
                expectedNodeKind: shape.nodeKind,
                actualValue: focusNode,
            }));
    }

    return results;
}
