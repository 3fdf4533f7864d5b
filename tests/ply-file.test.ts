import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { bindReader, bindWriter } from '../src/bind';
import { FormatError, IOError } from '../src/errors';
import { PlyFileReader, PlyFileWriter, detectFormat, withPlyReader, withPlyWriter } from '../src/ply-file';
import { PlyStreamWriter } from '../src/ply-writer';
import { ListSpec, ScalarSpec } from '../src/specs';
import { BufferOutputStream } from '../src/streams/output-stream';

let dir: string;

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ply-file-'));
});

afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
});

const binaryHeader = [
    'ply',
    'format binary_little_endian 1.0',
    'element vertex 3',
    'property float x',
    'property float y',
    'property float z',
    'end_header',
    ''
].join('\n');

describe('end to end', () => {
    const positions = Float32Array.from([0, 0, 0, 1, 2, 3, -1.5, 2.25, 0.1]);

    for (const mapping of [true, false]) {
        it(`round trips binary vertices (mapping ${mapping})`, () => {
            const path = join(dir, 'vertices.ply');

            withPlyWriter(path, { mapping, reserveSize: 1024 }, (writer) => {
                bindWriter(writer, new ScalarSpec('vertex', 'float32', ['x', 'y', 'z'], positions));
            });

            // the mapped reservation is cut back to the bytes written
            expect(statSync(path).size).toBe(binaryHeader.length + 36);
            expect(readFileSync(path, 'latin1').startsWith(binaryHeader)).toBe(true);

            const data = new Float32Array(9);
            withPlyReader(path, { mapping }, (reader) => {
                expect(reader.format).toBe('binary');
                expect(reader.elements.map(e => [e.name, e.count])).toEqual([['vertex', 3]]);
                bindReader(reader, new ScalarSpec('vertex', 'float32', ['x', 'y', 'z'], data));
            });
            expect(Array.from(data)).toEqual(Array.from(positions));
        });
    }

    it('round trips ascii triangle faces', () => {
        const path = join(dir, 'faces.ply');

        withPlyWriter(path, { format: 'ascii', mapping: true, reserveSize: 16 }, (writer) => {
            bindWriter(writer, new ListSpec('face', 'uint32', 'vertex_indices', [[0, 1, 2], [1, 2, 3]]));
        });

        expect(readFileSync(path, 'latin1')).toBe([
            'ply',
            'format ascii 1.0',
            'element face 2',
            'property list uchar uint vertex_indices',
            'end_header',
            '3 0 1 2',
            '3 1 2 3',
            ''
        ].join('\n'));

        const faces: number[][] = [];
        withPlyReader(path, {}, (reader) => {
            expect(reader.format).toBe('ascii');
            bindReader(reader, new ListSpec('face', 'uint32', 'vertex_indices', faces));
        });
        expect(faces).toEqual([[0, 1, 2], [1, 2, 3]]);
    });

    it('reads through a small chunk size', () => {
        const path = join(dir, 'chunks.ply');
        const values = Array.from({ length: 50 }, (_, i) => i * 0.5);

        withPlyWriter(path, { format: 'ascii', chunkSize: 8 }, (writer) => {
            bindWriter(writer, new ScalarSpec('vertex', 'float64', ['v'], values));
        });

        const data: number[] = [];
        withPlyReader(path, { chunkSize: 8 }, (reader) => {
            bindReader(reader, new ScalarSpec('vertex', 'float64', ['v'], data));
        });
        expect(data).toEqual(values);
    });
});

describe('scoped release', () => {
    it('truncates a mapped file when the writer callback throws', () => {
        const path = join(dir, 'partial.ply');

        expect(() => withPlyWriter(path, { mapping: true, reserveSize: 4096 }, (writer) => {
            writer.addComment('partial');
            writer.writeHeader();
            throw new Error('stop');
        })).toThrow('stop');

        expect(readFileSync(path, 'latin1')).toBe('ply\nformat binary_little_endian 1.0\ncomment partial\nend_header\n');
    });

    it('closes more than once without error', () => {
        const path = join(dir, 'twice.ply');
        const writer = new PlyFileWriter(path, { mapping: true, reserveSize: 64 });
        writer.writeHeader();
        writer.close();
        writer.close();

        const reader = new PlyFileReader(path, { mapping: true });
        expect(reader.elements).toEqual([]);
        reader.close();
        reader.close();
    });

    it('raises IOError for a missing input', () => {
        expect(() => new PlyFileReader(join(dir, 'missing.ply'))).toThrow(IOError);
    });
});

describe('detectFormat', () => {
    const file = (name: string, content: string) => {
        const path = join(dir, name);
        writeFileSync(path, content);
        return path;
    };

    it('classifies ascii and binary files', () => {
        expect(detectFormat(file('a.ply', 'ply\nformat ascii 1.0\nend_header\n'))).toBe('ascii');
        expect(detectFormat(file('b.ply', 'ply\nformat binary_little_endian 1.0\nend_header\n'))).toBe('binary');
    });

    it('rejects files with neither or both markers', () => {
        expect(() => detectFormat(file('none.ply', 'ply\nformat binary_big_endian 1.0\nend_header\n'))).toThrow(FormatError);
        expect(() => detectFormat(file('both.ply', 'ply\nformat ascii 1.0\ncomment format binary_little_endian\nend_header\n'))).toThrow(FormatError);
    });

    it('only looks at the first 1024 bytes', () => {
        const padding = `comment ${'x'.repeat(1100)}\n`;
        expect(() => detectFormat(file('late.ply', `ply\n${padding}format ascii 1.0\nend_header\n`))).toThrow(FormatError);
    });
});

describe('writer state', () => {
    it('rejects declarations after the header', () => {
        const writer = new PlyStreamWriter(new BufferOutputStream());
        writer.addElement({ name: 'vertex', count: 0, properties: [] });
        writer.writeHeader();

        expect(writer.hasHeader).toBe(true);
        expect(() => writer.addComment('late')).toThrow(FormatError);
        expect(() => writer.addElement({ name: 'face', count: 0, properties: [] })).toThrow(FormatError);
        expect(() => writer.writeHeader()).toThrow(FormatError);
    });

    it('rejects duplicate elements and bad names', () => {
        const writer = new PlyStreamWriter(new BufferOutputStream());
        writer.addElement({ name: 'vertex', count: 1, properties: [] });
        expect(() => writer.addElement({ name: 'vertex', count: 2, properties: [] })).toThrow(FormatError);
        expect(() => writer.addElement({ name: 'my face', count: 1, properties: [] })).toThrow(FormatError);
        expect(() => writer.addElement({ name: 'edge', count: 1, properties: [{ name: '', valueKind: 'int8', listKind: 'unused' }] })).toThrow(FormatError);
        expect(() => writer.addComment('two\nlines')).toThrow(FormatError);
        expect(writer.elements.map(e => e.name)).toEqual(['vertex']);
    });

    it('keeps comments in insertion order', () => {
        const output = new BufferOutputStream();
        const writer = new PlyStreamWriter(output, 'ascii');
        writer.addComment('first');
        writer.addComment('second');
        writer.writeHeader();
        expect(new TextDecoder().decode(output.bytes())).toBe('ply\nformat ascii 1.0\ncomment first\ncomment second\nend_header\n');
        expect(writer.comments).toEqual(['first', 'second']);
    });
});

describe('reader state', () => {
    it('parses the header once', () => {
        const path = join(dir, 'once.ply');
        writeFileSync(path, 'ply\nformat ascii 1.0\ncomment c\nelement v 1\nproperty int a\nend_header\n5\n');

        withPlyReader(path, {}, (reader) => {
            const header = reader.parseHeader();
            expect(reader.parseHeader()).toBe(header);
            expect(reader.comments).toEqual(['c']);
            expect(reader.getElement('v')?.count).toBe(1);
            expect(reader.getElement('w')).toBeNull();
            expect(reader.readValue('int32')).toBe(5);
        });
    });
});
