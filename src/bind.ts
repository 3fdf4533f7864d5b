import { BindError } from './errors';
import { PlyElement, PlyProperty, isListProperty } from './ply';
import { PlyStreamReader } from './ply-reader';
import { PlyStreamWriter } from './ply-writer';
import { castScalar } from './scalar';
import { ColumnSpec, ListSpec, ScalarSpec, checkSpecConflicts } from './specs';

// consumes one property of one row
type RowAction = (row: number) => void;

const readCount = (reader: PlyStreamReader, property: PlyProperty) => {
    return castScalar(reader.readValue(property.listKind), 'uint32');
};

const discardAction = (reader: PlyStreamReader, property: PlyProperty): RowAction => {
    if (isListProperty(property)) {
        return () => {
            const count = readCount(reader, property);
            for (let i = 0; i < count; ++i) {
                reader.readValue(property.valueKind);
            }
        };
    }
    return () => {
        reader.readValue(property.valueKind);
    };
};

const scalarAction = (reader: PlyStreamReader, property: PlyProperty, spec: ScalarSpec, column: number): RowAction => {
    return (row) => {
        spec.set(row, column, reader.readValue(property.valueKind));
    };
};

const listAction = (reader: PlyStreamReader, property: PlyProperty, spec: ListSpec): RowAction => {
    const read = () => reader.readValue(property.valueKind);
    return (row) => {
        spec.store(row, read, readCount(reader, property));
    };
};

// resolve every property of element to a bound or a discarding action
const planElement = (reader: PlyStreamReader, element: PlyElement, specs: readonly ColumnSpec[]) => {
    const actions = element.properties.map(p => discardAction(reader, p));

    for (const spec of specs) {
        if (spec.elementName !== element.name) {
            continue;
        }

        spec.attach(element.count);

        spec.propertyNames.forEach((name, column) => {
            const index = element.properties.findIndex(p => p.name === name);
            if (index === -1) {
                throw new BindError(`missing property '${name}' in element '${element.name}'`);
            }

            const property = element.properties[index];
            if (isListProperty(property) !== (spec.shape === 'list')) {
                throw new BindError(`shape mismatch binding ${spec.shape} spec to ${isListProperty(property) ? 'list' : 'scalar'} property '${name}' of element '${element.name}'`);
            }

            actions[index] = spec.shape === 'scalar' ?
                scalarAction(reader, property, spec, column) :
                listAction(reader, property, spec);
        });
    }

    return actions;
};

// read every row of every element, storing the properties the specs bind and
// skipping the rest. all specs are resolved before any row data is read.
const bindReader = (reader: PlyStreamReader, ...specs: ColumnSpec[]) => {
    checkSpecConflicts(specs);

    const plans = reader.elements
    .filter(element => element.count > 0)
    .map((element) => {
        return { element, actions: planElement(reader, element, specs) };
    });

    for (const { element, actions } of plans) {
        for (let row = 0; row < element.count; ++row) {
            for (let i = 0; i < actions.length; ++i) {
                actions[i](row);
            }
        }
    }
};

// merge the elements of all specs in first-occurrence order
const deriveElements = (specs: readonly ColumnSpec[]) => {
    const elements: PlyElement[] = [];

    for (const spec of specs) {
        const element = spec.create();
        const existing = elements.find(e => e.name === element.name);
        if (!existing) {
            elements.push(element);
        } else if (existing.count !== element.count) {
            throw new BindError(`element count mismatch for '${element.name}': ${existing.count} and ${element.count} rows`);
        } else {
            existing.properties.push(...element.properties);
        }
    }

    return elements;
};

const writeRow = (writer: PlyStreamWriter, spec: ColumnSpec, row: number) => {
    if (spec.shape === 'scalar') {
        for (let column = 0; column < spec.width; ++column) {
            writer.writeValue(spec.get(row, column), spec.kind);
        }
        return;
    }

    const values = spec.rows[row];
    if (castScalar(values.length, spec.countKind) !== values.length) {
        throw new BindError(`list of ${values.length} values in row ${row} of '${spec.elementName}' does not fit count kind ${spec.countKind}`);
    }
    writer.writeValue(values.length, spec.countKind);
    for (let i = 0; i < values.length; ++i) {
        writer.writeValue(values[i], spec.kind);
    }
};

// declare the elements of the specs, write the header and every row
const bindWriter = (writer: PlyStreamWriter, ...specs: ColumnSpec[]) => {
    checkSpecConflicts(specs);

    const elements = deriveElements(specs);

    elements.forEach(element => writer.addElement(element));
    writer.writeHeader();

    for (const element of elements) {
        const bound = specs.filter(spec => spec.elementName === element.name);
        for (let row = 0; row < element.count; ++row) {
            for (const spec of bound) {
                writeRow(writer, spec, row);
            }
            writer.writeLineEnd();
        }
    }

    writer.flush();
};

export { bindReader, bindWriter };
