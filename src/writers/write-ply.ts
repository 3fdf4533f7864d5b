import { bindWriter } from '../bind';
import { Column } from '../data-table';
import { PlyStreamWriter } from '../ply-writer';
import { PlyData } from '../readers/read-ply';
import { ColumnSpec, ListSpec, ScalarSpec } from '../specs';

// write the tables of plyData, properties in column order
const writePly = (writer: PlyStreamWriter, plyData: PlyData) => {
    plyData.comments.forEach(c => writer.addComment(c));

    const specs: ColumnSpec[] = plyData.elements.map((element) => {
        return element.dataTable.columns.map((column): ColumnSpec => {
            if (column instanceof Column) {
                return new ScalarSpec(element.name, column.dataType, [column.name], column.data);
            }
            return new ListSpec(element.name, column.dataType, column.name, column.rows, { countKind: column.countType });
        });
    }).flat();

    bindWriter(writer, ...specs);
};

export { writePly };
