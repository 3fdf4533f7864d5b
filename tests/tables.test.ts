import { describe, it, expect } from 'vitest';

import { Column, DataTable, ListColumn } from '../src/data-table';
import { PlyStreamReader } from '../src/ply-reader';
import { PlyStreamWriter } from '../src/ply-writer';
import { readPly } from '../src/readers/read-ply';
import { BufferInputStream } from '../src/streams/input-stream';
import { BufferOutputStream } from '../src/streams/output-stream';
import { writePly } from '../src/writers/write-ply';

const source = [
    'ply',
    'format ascii 1.0',
    'comment scanned',
    'element vertex 2',
    'property float x',
    'property uchar flags',
    'property list uchar int ring',
    'element face 1',
    'property list ushort uint vertex_indices',
    'end_header',
    '0.5 1 2 7 8',
    '-2 255 0',
    '3 0 1 1',
    ''
].join('\n');

const parse = (text: string) => {
    return readPly(new PlyStreamReader(new BufferInputStream(new TextEncoder().encode(text)), 'ascii'));
};

describe('readPly', () => {
    it('reads every element into a table', () => {
        const data = parse(source);

        expect(data.comments).toEqual(['scanned']);
        expect(data.elements.map(e => e.name)).toEqual(['vertex', 'face']);

        const vertex = data.elements[0].dataTable;
        expect(vertex.numRows).toBe(2);
        expect(vertex.columnNames).toEqual(['x', 'flags', 'ring']);
        expect(vertex.columnTypes).toEqual(['float32', 'uint8', 'int32']);
        expect(Array.from(vertex.getColumnByName('x')?.data ?? [])).toEqual([0.5, -2]);
        expect(vertex.getColumnByName('flags')?.data).toBeInstanceOf(Uint8Array);
        expect(vertex.getListColumnByName('ring')?.rows).toEqual([[7, 8], []]);
        expect(vertex.getRow(1)).toEqual({ x: -2, flags: 255 });

        const face = data.elements[1].dataTable.getListColumnByName('vertex_indices');
        expect(face?.countType).toBe('uint16');
        expect(face?.rows).toEqual([[0, 1, 1]]);
    });

    it('leaves out elements without properties', () => {
        const data = parse([
            'ply',
            'format ascii 1.0',
            'element marker 0',
            'element vertex 1',
            'property float x',
            'end_header',
            '4.5',
            ''
        ].join('\n'));

        expect(data.elements.map(e => e.name)).toEqual(['vertex']);
        expect(Array.from(data.elements[0].dataTable.getColumnByName('x')?.data ?? [])).toEqual([4.5]);
    });

    it('keeps the first of two properties with the same name', () => {
        const data = parse([
            'ply',
            'format ascii 1.0',
            'element vertex 2',
            'property float x',
            'property uchar x',
            'property float y',
            'end_header',
            '1 2 3',
            '4 5 6',
            ''
        ].join('\n'));

        const vertex = data.elements[0].dataTable;
        expect(vertex.columnNames).toEqual(['x', 'y']);
        expect(vertex.columnTypes).toEqual(['float32', 'float32']);
        expect(Array.from(vertex.getColumnByName('x')?.data ?? [])).toEqual([1, 4]);
        expect(Array.from(vertex.getColumnByName('y')?.data ?? [])).toEqual([3, 6]);
    });
});

describe('writePly', () => {
    it('writes what it reads', () => {
        const output = new BufferOutputStream();
        writePly(new PlyStreamWriter(output, 'ascii'), parse(source));
        expect(new TextDecoder().decode(output.bytes())).toBe(source);
    });

    it('writes tables built in memory', () => {
        const table = new DataTable([
            new Column('id', new Uint16Array([1, 2])),
            new ListColumn('links', 'uint8', [[9], [8, 7]])
        ]);

        const output = new BufferOutputStream();
        writePly(new PlyStreamWriter(output, 'ascii'), { comments: [], elements: [{ name: 'node', dataTable: table }] });

        expect(new TextDecoder().decode(output.bytes())).toBe([
            'ply',
            'format ascii 1.0',
            'element node 2',
            'property ushort id',
            'property list uchar uchar links',
            'end_header',
            '1 1 9',
            '2 2 8 7',
            ''
        ].join('\n'));
    });
});

describe('DataTable', () => {
    it('rejects columns of different lengths', () => {
        expect(() => new DataTable([
            new Column('a', new Float32Array(2)),
            new ListColumn('b', 'int8', [[]])
        ])).toThrow('inconsistent number of rows');
    });

    it('sets rows over the scalar columns', () => {
        const table = new DataTable([new Column('a', new Int8Array(1)), new Column('b', new Float64Array(1))]);
        table.setRow(0, { a: 130, b: 0.25 });
        expect(table.getRow(0)).toEqual({ a: -126, b: 0.25 });
        expect(table.clone().getRow(0)).toEqual({ a: -126, b: 0.25 });
        expect(table.removeColumn('a')).toBe(true);
        expect(table.hasColumn('a')).toBe(false);
    });
});
