import { BindError } from './errors';
import { PlyElement, listProperty, scalarProperty } from './ply';
import { IntegerKind, NumericKind, TypedArray, TypedArrayFor, castScalar, createTypedArray } from './scalar';

// a plain extensible array can be resized to match the file, a typed array
// (or a sealed array) has a fixed capacity
const isGrowable = (data: number[] | TypedArray): data is number[] => {
    return Array.isArray(data) && Object.isExtensible(data);
};

// frozen storage with values in it cannot take rows
const isReadOnly = (data: number[] | TypedArray) => data.length > 0 && Object.isFrozen(data);

const resize = (data: number[], length: number) => {
    const old = data.length;
    data.length = length;
    if (length > old) {
        data.fill(0, old);
    }
};

// binds rows of propertyNames.length values of one kind to an element. the
// rows are stored flat, row-major, in data.
class ScalarSpec<K extends NumericKind = NumericKind> {
    readonly shape = 'scalar';
    readonly elementName: string;
    readonly kind: K;
    readonly propertyNames: readonly string[];
    readonly data: number[] | TypedArrayFor<K>;

    constructor(elementName: string, kind: K, propertyNames: readonly string[], data: number[] | TypedArrayFor<K> = []) {
        if (propertyNames.length === 0) {
            throw new BindError(`spec for element '${elementName}' binds no properties`);
        }
        this.elementName = elementName;
        this.kind = kind;
        this.propertyNames = propertyNames;
        this.data = data;
    }

    get width() {
        return this.propertyNames.length;
    }

    get rowCount() {
        const length = this.data.length;
        if (length % this.width !== 0) {
            throw new BindError(`storage for '${this.elementName}' holds ${length} values, not a multiple of ${this.width} columns`);
        }
        return length / this.width;
    }

    // size the storage for count rows
    attach(count: number) {
        const data: number[] | TypedArray = this.data;
        const size = count * this.width;
        if (isReadOnly(data)) {
            throw new BindError(`storage for '${this.elementName}' is frozen`);
        }
        if (data.length === size) {
            return;
        }
        if (!isGrowable(data)) {
            throw new BindError(`fixed storage for '${this.elementName}' holds ${data.length / this.width} rows but the element has ${count}`);
        }
        resize(data, size);
    }

    get(row: number, column: number): number {
        const data: number[] | TypedArray = this.data;
        return data[row * this.width + column];
    }

    set(row: number, column: number, value: number) {
        const data: number[] | TypedArray = this.data;
        data[row * this.width + column] = castScalar(value, this.kind);
    }

    create(): PlyElement {
        return {
            name: this.elementName,
            count: this.rowCount,
            properties: this.propertyNames.map(name => scalarProperty(name, this.kind))
        };
    }
}

type ListRow<K extends NumericKind> = number[] | TypedArrayFor<K>;

type ListSpecOptions = {
    // kind of the count prefix written before each row
    countKind?: IntegerKind;

    // capacity of rows created while reading, 0 for growable rows
    length?: number;
};

// binds one list property of an element to an array of rows
class ListSpec<K extends NumericKind = NumericKind> {
    readonly shape = 'list';
    readonly elementName: string;
    readonly kind: K;
    readonly propertyName: string;
    readonly countKind: IntegerKind;
    readonly length: number;
    readonly rows: ListRow<K>[];

    constructor(elementName: string, kind: K, propertyName: string, rows: ListRow<K>[] = [], options: ListSpecOptions = {}) {
        this.elementName = elementName;
        this.kind = kind;
        this.propertyName = propertyName;
        this.rows = rows;
        this.countKind = options.countKind ?? 'uint8';
        this.length = options.length ?? 0;
    }

    get propertyNames(): readonly string[] {
        return [this.propertyName];
    }

    get rowCount() {
        return this.rows.length;
    }

    private createRow(): ListRow<K> {
        return this.length > 0 ? createTypedArray(this.kind, this.length) : [];
    }

    attach(count: number) {
        const rows = this.rows;
        if (rows.length !== count) {
            if (!Object.isExtensible(rows)) {
                throw new BindError(`fixed storage for '${this.elementName}' holds ${rows.length} rows but the element has ${count}`);
            }
            if (rows.length > count) {
                rows.length = count;
            }
            while (rows.length < count) {
                rows.push(this.createRow());
            }
        }

        const frozen = rows.findIndex(isReadOnly);
        if (frozen !== -1) {
            throw new BindError(`row ${frozen} of '${this.elementName}' is frozen`);
        }
    }

    // store the count values of one file row. a growable row takes all of
    // them, a fixed row keeps the first min(count, capacity) and the rest are
    // dropped.
    store(row: number, read: () => number, count: number) {
        const target: number[] | TypedArray = this.rows[row];
        if (isGrowable(target)) {
            target.length = count;
            for (let i = 0; i < count; ++i) {
                target[i] = castScalar(read(), this.kind);
            }
        } else {
            for (let i = 0; i < count; ++i) {
                const value = read();
                if (i < target.length) {
                    target[i] = castScalar(value, this.kind);
                }
            }
        }
    }

    create(): PlyElement {
        return {
            name: this.elementName,
            count: this.rowCount,
            properties: [listProperty(this.propertyName, this.kind, this.countKind)]
        };
    }
}

type ColumnSpec = ScalarSpec | ListSpec;

// two specs may not bind the same property of the same element, and one spec
// may not name a property twice
const checkSpecConflicts = (specs: readonly ColumnSpec[]) => {
    const bound = new Set<string>();
    for (const spec of specs) {
        for (const name of spec.propertyNames) {
            const key = `${spec.elementName}\n${name}`;
            if (bound.has(key)) {
                throw new BindError(`multiple specs bind property '${name}' of element '${spec.elementName}'`);
            }
            bound.add(key);
        }
    }
};

export { ScalarSpec, ListSpec, ListRow, ListSpecOptions, ColumnSpec, checkSpecConflicts };
