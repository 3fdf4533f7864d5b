import { IntegerKind, NumericKind, TypedArray, typedArrayKind } from './scalar';

class Column {
    name: string;
    data: TypedArray;

    constructor(name: string, data: TypedArray) {
        this.name = name;
        this.data = data;
    }

    get dataType(): NumericKind {
        return typedArrayKind(this.data);
    }

    get length() {
        return this.data.length;
    }

    clone(): Column {
        return new Column(this.name, this.data.slice());
    }
}

// a list-valued column: one variable-length row of values per table row
class ListColumn {
    name: string;
    dataType: NumericKind;
    countType: IntegerKind;
    rows: number[][];

    constructor(name: string, dataType: NumericKind, rows: number[][], countType: IntegerKind = 'uint8') {
        this.name = name;
        this.dataType = dataType;
        this.countType = countType;
        this.rows = rows;
    }

    get length() {
        return this.rows.length;
    }

    clone(): ListColumn {
        return new ListColumn(this.name, this.dataType, this.rows.map(r => r.slice()), this.countType);
    }
}

type AnyColumn = Column | ListColumn;

type Row = {
    [colName: string]: number;
};

class DataTable {
    columns: AnyColumn[];

    constructor(columns: AnyColumn[]) {
        if (columns.length === 0) {
            throw new Error('DataTable must have at least one column');
        }

        // check all columns have the same lengths
        for (let i = 1; i < columns.length; i++) {
            if (columns[i].length !== columns[0].length) {
                throw new Error(`Column '${columns[i].name}' has inconsistent number of rows: expected ${columns[0].length}, got ${columns[i].length}`);
            }
        }

        this.columns = columns;
    }

    // rows

    get numRows() {
        return this.columns[0].length;
    }

    // scalar columns only
    get scalarColumns(): Column[] {
        return this.columns.filter((c): c is Column => c instanceof Column);
    }

    getRow(index: number, row: Row = {}, columns = this.scalarColumns): Row {
        for (const column of columns) {
            row[column.name] = column.data[index];
        }
        return row;
    }

    setRow(index: number, row: Row, columns = this.scalarColumns) {
        for (const column of columns) {
            if (Object.prototype.hasOwnProperty.call(row, column.name)) {
                column.data[index] = row[column.name];
            }
        }
    }

    // columns

    get numColumns() {
        return this.columns.length;
    }

    get columnNames() {
        return this.columns.map(column => column.name);
    }

    get columnTypes() {
        return this.columns.map(column => column.dataType);
    }

    getColumnByName(name: string): Column | null {
        return this.scalarColumns.find(column => column.name === name) ?? null;
    }

    getListColumnByName(name: string): ListColumn | null {
        return this.columns.find((column): column is ListColumn => column instanceof ListColumn && column.name === name) ?? null;
    }

    hasColumn(name: string): boolean {
        return this.columns.some(column => column.name === name);
    }

    addColumn(column: AnyColumn) {
        if (column.length !== this.numRows) {
            throw new Error(`Column '${column.name}' has inconsistent number of rows: expected ${this.numRows}, got ${column.length}`);
        }
        this.columns.push(column);
    }

    removeColumn(name: string) {
        const index = this.columns.findIndex(column => column.name === name);
        if (index === -1) {
            return false;
        }
        this.columns.splice(index, 1);
        return true;
    }

    clone(): DataTable {
        return new DataTable(this.columns.map(c => c.clone()));
    }
}

export { Column, ListColumn, AnyColumn, DataTable, Row };
