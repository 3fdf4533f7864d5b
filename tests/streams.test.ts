import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { IOError } from '../src/errors';
import { BufferInputStream, FileInputStream, MappedFileInputStream } from '../src/streams/input-stream';
import { BufferOutputStream, FileOutputStream, MappedFileOutputStream } from '../src/streams/output-stream';

let dir: string;

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ply-streams-'));
});

afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
});

const read = (path: string) => readFileSync(path, 'latin1');

describe('BufferOutputStream', () => {
    it('grows when writes pass the capacity', () => {
        const stream = new BufferOutputStream(4);
        stream.writeAscii('abcdef');
        expect(stream.capacity).toBe(8);
        expect(new TextDecoder().decode(stream.bytes())).toBe('abcdef');
    });

    it('limits seeks to the arena', () => {
        const stream = new BufferOutputStream(4);
        stream.writeAscii('abc');
        expect(stream.seek(-1, 'current')).toBe(2);
        expect(stream.seek(5)).toBe(-1);
        expect(stream.seek(-1)).toBe(-1);
        expect(stream.position).toBe(2);
        expect(stream.seek(0, 'end')).toBe(4);
        expect(stream.seek(1)).toBe(1);
        stream.writeAscii('X');
        expect(new TextDecoder().decode(stream.bytes())).toBe('aX');
    });
});

describe('MappedFileOutputStream', () => {
    it('reserves the file up front and truncates it on close', () => {
        const path = join(dir, 'out.bin');
        const stream = new MappedFileOutputStream(path, 16);
        expect(statSync(path).size).toBe(16);

        stream.writeAscii('hello');
        stream.close();

        expect(statSync(path).size).toBe(5);
        expect(read(path)).toBe('hello');
        expect(stream.released).toBe(true);

        // a second release is a no-op
        stream.close();
        expect(statSync(path).size).toBe(5);
    });

    it('remaps to a larger reservation instead of failing', () => {
        const path = join(dir, 'out.bin');
        const stream = new MappedFileOutputStream(path, 4);
        stream.writeAscii('abcdefghij');
        expect(stream.capacity).toBe(10);
        expect(statSync(path).size).toBe(10);
        stream.close();
        expect(read(path)).toBe('abcdefghij');
    });

    it('fails seeks outside the reservation', () => {
        const path = join(dir, 'out.bin');
        const stream = new MappedFileOutputStream(path, 8);
        expect(stream.seek(9)).toBe(-1);
        expect(stream.seek(8)).toBe(8);
        expect(stream.seek(-9, 'current')).toBe(-1);
        stream.close();
    });

    it('writes flushed bytes before close', () => {
        const path = join(dir, 'out.bin');
        const stream = new MappedFileOutputStream(path, 8);
        stream.writeAscii('ab');
        stream.flush();
        expect(read(path).substring(0, 2)).toBe('ab');
        stream.close();
        expect(read(path)).toBe('ab');
    });

    it('rejects writes after release', () => {
        const path = join(dir, 'out.bin');
        const stream = new MappedFileOutputStream(path, 8);
        stream.writeAscii('ab');
        stream.close();
        expect(() => stream.writeAscii('c')).toThrow(IOError);
    });

    it('rejects invalid reserve sizes', () => {
        const path = join(dir, 'out.bin');
        expect(() => new MappedFileOutputStream(path, -1)).toThrow(IOError);
        expect(() => new MappedFileOutputStream(path, 1.5)).toThrow('invalid reserve size 1.5');
    });

    it('raises IOError naming the path when the file cannot be created', () => {
        const path = join(dir, 'missing', 'out.bin');
        expect(() => new MappedFileOutputStream(path, 8)).toThrow(path);
    });
});

describe('FileOutputStream', () => {
    it('writes through a small buffer and seeks back', () => {
        const path = join(dir, 'out.bin');
        const stream = new FileOutputStream(path, 4);
        stream.writeAscii('abcdef');
        expect(stream.seek(1)).toBe(1);
        stream.writeAscii('X');
        stream.close();
        expect(read(path)).toBe('aXcdef');
    });

    it('retracts across a flushed buffer', () => {
        const path = join(dir, 'out.bin');
        const stream = new FileOutputStream(path, 4);
        stream.writeAscii('ab ');
        stream.flush();
        expect(stream.seek(-1, 'current')).toBe(2);
        stream.writeAscii('\n');
        stream.close();
        expect(read(path)).toBe('ab\n');
    });
});

describe('input streams', () => {
    it('reads lines and tokens spanning buffer refills', () => {
        const path = join(dir, 'in.txt');
        writeFileSync(path, 'ply\nformat ascii 1.0\n12345678 -9\n');

        const stream = new FileInputStream(path, 4);
        expect(stream.readLine()).toBe('ply');
        expect(stream.readLine()).toBe('format ascii 1.0');
        expect(stream.readToken()).toBe('12345678');
        expect(stream.readToken()).toBe('-9');
        expect(stream.readToken()).toBeNull();
        expect(stream.readLine()).toBeNull();
        expect(stream.position).toBe(33);
        stream.close();
        stream.close();
    });

    it('reads binary values through the mapped view', () => {
        const path = join(dir, 'in.bin');
        writeFileSync(path, new Uint8Array([1, 2, 3, 4, 5]));

        const stream = new MappedFileInputStream(path);
        const offset = stream.take(4);
        expect(stream.dataView.getUint32(offset, true)).toBe(0x04030201);
        expect(() => stream.take(2)).toThrow(IOError);
        expect(Array.from(stream.readBytes(1))).toEqual([5]);
        stream.close();
    });

    it('returns the last line without a terminator', () => {
        const stream = new BufferInputStream(new TextEncoder().encode('a\nb'));
        expect(stream.readLine()).toBe('a');
        expect(stream.readLine()).toBe('b');
        expect(stream.readLine()).toBeNull();
    });

    it('raises IOError for missing files', () => {
        expect(() => new FileInputStream(join(dir, 'nope.ply'))).toThrow(IOError);
        expect(() => new MappedFileInputStream(join(dir, 'nope.ply'))).toThrow(IOError);
    });
});
