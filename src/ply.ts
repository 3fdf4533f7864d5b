import { NumericKind, ScalarKind } from './scalar';

type PlyFormat = 'binary' | 'ascii';

type PlyProperty = {
    name: string;               // 'x', 'f_dc_0', 'vertex_indices', etc
    valueKind: ScalarKind;      // kind of the value (or of each list entry)
    listKind: ScalarKind;       // kind of the list count, 'unused' for scalar properties
};

type PlyElement = {
    name: string;               // 'vertex', 'face', etc
    count: number;
    properties: PlyProperty[];
};

type PlyHeader = {
    comments: string[];
    elements: PlyElement[];
};

const isListProperty = (property: PlyProperty) => property.listKind !== 'unused';

const scalarProperty = (name: string, valueKind: NumericKind): PlyProperty => {
    return { name, valueKind, listKind: 'unused' };
};

const listProperty = (name: string, valueKind: NumericKind, listKind: NumericKind): PlyProperty => {
    return { name, valueKind, listKind };
};

const cloneElement = (element: PlyElement): PlyElement => {
    return {
        name: element.name,
        count: element.count,
        properties: element.properties.map(p => ({ ...p }))
    };
};

export { PlyFormat, PlyProperty, PlyElement, PlyHeader, isListProperty, scalarProperty, listProperty, cloneElement };
