import { FormatError } from './errors';
import { FormatHandler } from './format-handler';
import { PlyElement, PlyHeader, PlyProperty } from './ply';
import { ScalarKind, scalarKindFromString, scalarKindToString } from './scalar';
import { InputStream } from './streams/input-stream';

const parseKind = (token: string | undefined, line: string): ScalarKind => {
    const kind = token === undefined ? null : scalarKindFromString(token);
    if (kind === null) {
        throw new FormatError(`unsupported scalar type '${token ?? ''}' in ply header line '${line}'`);
    }
    return kind;
};

const parseCount = (token: string, line: string) => {
    const count = /^\d+$/.test(token) ? Number(token) : NaN;
    if (!Number.isSafeInteger(count)) {
        throw new FormatError(`invalid element count '${token}' in ply header line '${line}'`);
    }
    return count;
};

// read the header lines up to and including 'end_header'. the stream is left
// positioned on the first byte of row data.
const parseHeader = (input: InputStream, handler: FormatHandler): PlyHeader => {
    const magic = input.readLine();
    if (magic === null || !magic.startsWith('ply')) {
        throw new FormatError('invalid ply file: missing \'ply\' magic number');
    }

    const format = input.readLine();
    if (format === null || !format.startsWith(handler.formatHeader)) {
        throw new FormatError(`unsupported ply format '${format ?? ''}', expected '${handler.formatHeader}'`);
    }

    const comments: string[] = [];
    const elements: PlyElement[] = [];
    let element: PlyElement | null = null;

    for (;;) {
        const line = input.readLine();
        if (line === null) {
            throw new FormatError('unexpected end of file in ply header');
        }

        if (line.startsWith('end_header')) {
            break;
        }

        const words = line.trim().split(/\s+/);

        switch (words[0]) {
            case 'comment':
                comments.push(line.substring(8)); // skip 'comment '
                break;
            case 'element': {
                if (words.length !== 3) {
                    throw new FormatError(`invalid element line '${line}' in ply header`);
                }
                element = {
                    name: words[1],
                    count: parseCount(words[2], line),
                    properties: []
                };
                elements.push(element);
                break;
            }
            case 'property': {
                if (!element) {
                    throw new FormatError(`property defined without a parent element: '${line}'`);
                }
                let property: PlyProperty;
                if (words[1] === 'list') {
                    if (words.length !== 5) {
                        throw new FormatError(`invalid list property line '${line}' in ply header`);
                    }
                    property = {
                        name: words[4],
                        valueKind: parseKind(words[3], line),
                        listKind: parseKind(words[2], line)
                    };
                } else {
                    if (words.length !== 3) {
                        throw new FormatError(`invalid property line '${line}' in ply header`);
                    }
                    property = {
                        name: words[2],
                        valueKind: parseKind(words[1], line),
                        listKind: 'unused'
                    };
                }
                element.properties.push(property);
                break;
            }
            default:
                // obj_info and unknown keywords carry nothing we bind to
                break;
        }
    }

    return { comments, elements };
};

const propertyLine = (property: PlyProperty) => {
    if (property.listKind !== 'unused') {
        return `property list ${scalarKindToString(property.listKind)} ${scalarKindToString(property.valueKind)} ${property.name}`;
    }
    return `property ${scalarKindToString(property.valueKind)} ${property.name}`;
};

// render the header text, terminated by 'end_header\n'
const emitHeader = (header: PlyHeader, handler: FormatHandler): string => {
    const lines = [
        'ply',
        handler.formatHeader,
        header.comments.map(c => `comment ${c}`),
        header.elements.map((element) => {
            return [
                `element ${element.name} ${element.count}`,
                element.properties.map(propertyLine)
            ];
        }),
        'end_header'
    ];

    return `${lines.flat(3).join('\n')}\n`;
};

export { parseHeader, emitHeader };
