import { bindReader } from '../bind';
import { AnyColumn, Column, DataTable, ListColumn } from '../data-table';
import { isListProperty } from '../ply';
import { PlyStreamReader } from '../ply-reader';
import { createTypedArray, isIntegerKind, numericKind } from '../scalar';
import { ColumnSpec, ListSpec, ScalarSpec } from '../specs';

type PlyData = {
    comments: string[];
    elements: {
        name: string,
        dataTable: DataTable
    }[];
};

// read every element of the file into a data table, one column per property.
// elements without properties carry no values and are left out. a property
// name declared twice binds its first occurrence, later ones are skipped.
const readPly = (reader: PlyStreamReader): PlyData => {
    const header = reader.parseHeader();

    const specs: ColumnSpec[] = [];
    const tables = header.elements
    .filter(element => element.properties.length > 0)
    .map((element) => {
        const properties = element.properties.filter((p, i, all) => all.findIndex(q => q.name === p.name) === i);

        const columns: AnyColumn[] = properties.map((property) => {
            const kind = numericKind(property.valueKind);

            if (isListProperty(property)) {
                const rows: number[][] = [];
                const countKind = isIntegerKind(property.listKind) ? property.listKind : 'uint32';
                specs.push(new ListSpec(element.name, kind, property.name, rows, { countKind }));
                return new ListColumn(property.name, kind, rows, countKind);
            }

            const data = createTypedArray(kind, element.count);
            specs.push(new ScalarSpec(element.name, kind, [property.name], data));
            return new Column(property.name, data);
        });

        return { name: element.name, columns };
    });

    bindReader(reader, ...specs);

    return {
        comments: header.comments.slice(),
        elements: tables.map(({ name, columns }) => {
            return { name, dataTable: new DataTable(columns) };
        })
    };
};

export { PlyData, readPly };
