import { Quat, Vec3 } from 'playcanvas';

import { DataTable } from './data-table';
import { transform } from './transform';

type ProcessAction =
    | { kind: 'translate', value: Vec3 }
    | { kind: 'rotate', value: Vec3 }           // euler angles in degrees
    | { kind: 'scale', value: number };

type TRS = {
    t: Vec3;
    r: Quat;
    s: number;
};

const toTRS = (action: ProcessAction): TRS => {
    switch (action.kind) {
        case 'translate':
            return { t: action.value, r: Quat.IDENTITY, s: 1 };
        case 'rotate': {
            const { x, y, z } = action.value;
            return { t: Vec3.ZERO, r: new Quat().setFromEulerAngles(x, y, z), s: 1 };
        }
        case 'scale':
            return { t: Vec3.ZERO, r: Quat.IDENTITY, s: action.value };
    }
};

// apply the actions in order to a vertex data table, in place
const processDataTable = (dataTable: DataTable, actions: readonly ProcessAction[]) => {
    // rotating higher order spherical harmonics is not supported
    if (dataTable.hasColumn('f_rest_0') && actions.some(a => a.kind === 'rotate')) {
        throw new Error('rotating data with f_rest_* spherical harmonic coefficients is not supported');
    }

    for (const action of actions) {
        const { t, r, s } = toTRS(action);
        transform(dataTable, t, r, s);
    }

    return dataTable;
};

export { ProcessAction, processDataTable };
