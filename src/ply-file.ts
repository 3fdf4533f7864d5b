import { closeSync, openSync, readSync } from 'node:fs';

import { FormatError, IOError, describeCause } from './errors';
import { PlyFormat } from './ply';
import { PlyStreamReader } from './ply-reader';
import { PlyStreamWriter } from './ply-writer';
import { FileInputStream, InputStream, MappedFileInputStream } from './streams/input-stream';
import { FileOutputStream, MappedFileOutputStream, OutputStream } from './streams/output-stream';

// bytes pre-reserved for a mapped output file
const DEFAULT_RESERVE_SIZE = 100 * 1024 * 1024;

const DEFAULT_CHUNK_SIZE = 64 * 1024;

type PlyFileReaderOptions = {
    mapping?: boolean;
    chunkSize?: number;
};

type PlyFileWriterOptions = {
    format?: PlyFormat;
    mapping?: boolean;
    reserveSize?: number;
    chunkSize?: number;
};

const readPrefix = (path: string, size: number) => {
    let fd: number;
    try {
        fd = openSync(path, 'r');
    } catch (err) {
        throw new IOError(`failed to open file '${path}': ${describeCause(err)}`, { cause: err });
    }

    try {
        const buffer = new Uint8Array(size);
        let length = 0;
        while (length < size) {
            const bytesRead = readSync(fd, buffer, length, size - length, length);
            if (bytesRead === 0) break;
            length += bytesRead;
        }
        return buffer.subarray(0, length);
    } catch (err) {
        throw new IOError(`failed to read file '${path}': ${describeCause(err)}`, { cause: err });
    } finally {
        closeSync(fd);
    }
};

// classify an existing file from the first 1024 bytes of its header
const detectFormat = (path: string): PlyFormat => {
    const text = new TextDecoder('ascii').decode(readPrefix(path, 1024));
    const ascii = text.includes('format ascii');
    const binary = text.includes('format binary_little_endian');

    if (ascii === binary) {
        throw new FormatError(`unable to determine ply format of '${path}'`);
    }
    return ascii ? 'ascii' : 'binary';
};

const openInputStream = (path: string, mapping = false, chunkSize = DEFAULT_CHUNK_SIZE): InputStream => {
    return mapping ? new MappedFileInputStream(path) : new FileInputStream(path, chunkSize);
};

const openOutputStream = (path: string, mapping = false, reserveSize = DEFAULT_RESERVE_SIZE, chunkSize = DEFAULT_CHUNK_SIZE): OutputStream => {
    return mapping ? new MappedFileOutputStream(path, reserveSize) : new FileOutputStream(path, chunkSize);
};

const openReaderStream = (path: string, options: PlyFileReaderOptions) => {
    const format = detectFormat(path);
    return { format, input: openInputStream(path, options.mapping, options.chunkSize) };
};

// reader over a file on disk. the format is detected from the header.
class PlyFileReader extends PlyStreamReader {
    readonly path: string;

    constructor(path: string, options: PlyFileReaderOptions = {}) {
        const { format, input } = openReaderStream(path, options);
        super(input, format);
        this.path = path;
    }

    close() {
        this.input.close();
    }
}

// writer to a file on disk. close() must run exactly once on every path so a
// mapped file is cut back to the bytes written.
class PlyFileWriter extends PlyStreamWriter {
    readonly path: string;

    constructor(path: string, options: PlyFileWriterOptions = {}) {
        super(openOutputStream(path, options.mapping, options.reserveSize, options.chunkSize), options.format ?? 'binary');
        this.path = path;
    }

    close() {
        this.output.close();
    }
}

const withPlyReader = <T>(path: string, options: PlyFileReaderOptions, fn: (reader: PlyFileReader) => T): T => {
    const reader = new PlyFileReader(path, options);
    try {
        return fn(reader);
    } finally {
        reader.close();
    }
};

const withPlyWriter = <T>(path: string, options: PlyFileWriterOptions, fn: (writer: PlyFileWriter) => T): T => {
    const writer = new PlyFileWriter(path, options);
    try {
        return fn(writer);
    } finally {
        writer.close();
    }
};

export {
    DEFAULT_RESERVE_SIZE,
    PlyFileReaderOptions,
    PlyFileWriterOptions,
    detectFormat,
    openInputStream,
    openOutputStream,
    PlyFileReader,
    PlyFileWriter,
    withPlyReader,
    withPlyWriter
};
