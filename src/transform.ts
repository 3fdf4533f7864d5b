import { Mat4, Quat, Vec3 } from 'playcanvas';

import { DataTable } from './data-table';
import { TypedArray } from './scalar';

// data of the named scalar columns, or null when any is missing
const columnData = (dataTable: DataTable, names: readonly string[]) => {
    const result: TypedArray[] = [];
    for (const name of names) {
        const column = dataTable.getColumnByName(name);
        if (!column) {
            return null;
        }
        result.push(column.data);
    }
    return result;
};

const transformPoints = ([x, y, z]: TypedArray[], mat: Mat4) => {
    const p = new Vec3();
    for (let i = 0; i < x.length; ++i) {
        mat.transformPoint(p.set(x[i], y[i], z[i]), p);
        x[i] = p.x;
        y[i] = p.y;
        z[i] = p.z;
    }
};

const rotateVectors = ([x, y, z]: TypedArray[], r: Quat) => {
    const v = new Vec3();
    for (let i = 0; i < x.length; ++i) {
        r.transformVector(v.set(x[i], y[i], z[i]), v);
        x[i] = v.x;
        y[i] = v.y;
        z[i] = v.z;
    }
};

// orientation columns hold w first
const rotateOrientations = ([w, x, y, z]: TypedArray[], r: Quat) => {
    const q = new Quat();
    for (let i = 0; i < w.length; ++i) {
        q.set(x[i], y[i], z[i], w[i]).mul2(r, q);
        w[i] = q.w;
        x[i] = q.x;
        y[i] = q.y;
        z[i] = q.z;
    }
};

// scales are stored as logarithms
const scaleLogs = (columns: TypedArray[], s: number) => {
    const shift = Math.log(s);
    for (const data of columns) {
        for (let i = 0; i < data.length; ++i) {
            data[i] += shift;
        }
    }
};

// apply translation t, rotation r and uniform scale s to the vertex columns
// of a data table: positions, normals and gaussian splat rotation/scale
const transform = (dataTable: DataTable, t: Vec3, r: Quat, s: number) => {
    const positions = columnData(dataTable, ['x', 'y', 'z']);
    if (positions) {
        transformPoints(positions, new Mat4().setTRS(t, r, new Vec3(s, s, s)));
    }

    const normals = columnData(dataTable, ['nx', 'ny', 'nz']);
    if (normals) {
        rotateVectors(normals, r);
    }

    const orientations = columnData(dataTable, ['rot_0', 'rot_1', 'rot_2', 'rot_3']);
    if (orientations) {
        rotateOrientations(orientations, r);
    }

    const scales = columnData(dataTable, ['scale_0', 'scale_1', 'scale_2']);
    if (scales && s !== 1) {
        scaleLogs(scales, s);
    }
};

export { transform };
