import { closeSync, ftruncateSync, openSync, writeSync } from 'node:fs';

import { IOError, describeCause } from '../errors';

type SeekOrigin = 'begin' | 'current' | 'end';

const encoder = new TextEncoder();

// defines the interface for a byte sink. data is written by claiming a range
// of the current buffer and filling it through dataView.
abstract class OutputStream {
    protected buffer: Uint8Array = new Uint8Array(0);
    protected cursor = 0;

    private view = new DataView(this.buffer.buffer);

    // make room for size bytes at the cursor
    protected abstract reserve(size: number): void;

    // absolute put position
    abstract get position(): number;

    // move the put position. returns the new absolute position or -1 when
    // the target cannot be reached.
    abstract seek(offset: number, origin?: SeekOrigin): number;

    abstract flush(): void;

    abstract close(): void;

    // notified of every claimed range [start, end) of the buffer
    protected written(start: number, end: number): void {
        // no bookkeeping by default
    }

    protected setBuffer(buffer: Uint8Array) {
        this.buffer = buffer;
        this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    }

    // view over the current buffer; offsets returned by claim() index into it
    get dataView() {
        return this.view;
    }

    // claim size bytes at the put position and return their offset in dataView
    claim(size: number): number {
        if (this.cursor + size > this.buffer.length) {
            this.reserve(size);
        }
        const offset = this.cursor;
        this.cursor += size;
        this.written(offset, this.cursor);
        return offset;
    }

    write(data: Uint8Array) {
        const offset = this.claim(data.length);
        this.buffer.set(data, offset);
    }

    // write a string made of 7-bit characters only
    writeAscii(text: string) {
        const offset = this.claim(text.length);
        for (let i = 0; i < text.length; ++i) {
            this.buffer[offset + i] = text.charCodeAt(i);
        }
    }

    writeText(text: string) {
        this.write(encoder.encode(text));
    }
}

// in-memory arena. seeks are limited to [0, capacity]; writes past the
// capacity move everything to a larger arena.
class BufferOutputStream extends OutputStream {
    constructor(capacity = 64 * 1024) {
        super();
        this.setBuffer(new Uint8Array(capacity));
    }

    get capacity() {
        return this.buffer.length;
    }

    get position() {
        return this.cursor;
    }

    protected reserve(size: number) {
        this.grow(Math.max(this.buffer.length * 2, this.cursor + size));
    }

    protected grow(capacity: number) {
        const grown = new Uint8Array(capacity);
        grown.set(this.buffer);
        this.setBuffer(grown);
    }

    seek(offset: number, origin: SeekOrigin = 'begin') {
        const from = origin === 'begin' ? 0 : origin === 'current' ? this.cursor : this.buffer.length;
        const target = from + offset;
        if (target < 0 || target > this.buffer.length) {
            return -1;
        }
        this.cursor = target;
        return target;
    }

    // bytes written up to the put position
    bytes(): Uint8Array {
        return this.buffer.subarray(0, this.cursor);
    }

    flush() {
        // nothing to flush
    }

    close() {
        // nothing to release
    }
}

const openForWrite = (path: string) => {
    try {
        return openSync(path, 'w');
    } catch (err) {
        throw new IOError(`failed to open file '${path}': ${describeCause(err)}`, { cause: err });
    }
};

const writeFully = (fd: number, data: Uint8Array, position: number, path: string) => {
    try {
        let done = 0;
        while (done < data.length) {
            done += writeSync(fd, data, done, data.length - done, position + done);
        }
    } catch (err) {
        throw new IOError(`failed to write file '${path}': ${describeCause(err)}`, { cause: err });
    }
};

const checkReserveSize = (path: string, reserveSize: number) => {
    if (!Number.isSafeInteger(reserveSize) || reserveSize < 0) {
        throw new IOError(`invalid reserve size ${reserveSize} for file '${path}'`);
    }
    return reserveSize;
};

const resizeFile = (fd: number, size: number, path: string) => {
    try {
        ftruncateSync(fd, size);
    } catch (err) {
        throw new IOError(`failed to resize file '${path}' to ${size} bytes: ${describeCause(err)}`, { cause: err });
    }
};

// write-side mapping: the file is created and reserved up front, rows are
// written into an arena of the reserved size and the file is cut back to
// the put position when the stream is released
class MappedFileOutputStream extends BufferOutputStream {
    readonly path: string;

    private fd: number | null;

    // range of the arena not yet written to the file
    private dirtyStart = Infinity;
    private dirtyEnd = 0;

    constructor(path: string, reserveSize: number) {
        super(checkReserveSize(path, reserveSize));
        this.path = path;

        const fd = openForWrite(path);
        try {
            resizeFile(fd, reserveSize, path);
        } catch (err) {
            closeSync(fd);
            throw err;
        }
        this.fd = fd;
    }

    get released() {
        return this.fd === null;
    }

    protected written(start: number, end: number) {
        if (start < this.dirtyStart) this.dirtyStart = start;
        if (end > this.dirtyEnd) this.dirtyEnd = end;
    }

    // remap to a larger reservation
    protected grow(capacity: number) {
        if (this.fd === null) {
            throw new IOError(`write to released file '${this.path}'`);
        }
        resizeFile(this.fd, capacity, this.path);
        super.grow(capacity);
    }

    flush() {
        if (this.fd === null || this.dirtyEnd <= this.dirtyStart) {
            return;
        }
        writeFully(this.fd, this.buffer.subarray(this.dirtyStart, this.dirtyEnd), this.dirtyStart, this.path);
        this.dirtyStart = Infinity;
        this.dirtyEnd = 0;
    }

    // unmap and truncate to the bytes actually written. a second call is a no-op.
    close() {
        if (this.fd === null) {
            return;
        }
        const fd = this.fd;
        try {
            this.flush();
            resizeFile(fd, this.cursor, this.path);
        } finally {
            this.fd = null;
            this.setBuffer(new Uint8Array(0));
            closeSync(fd);
        }
    }
}

// conventional buffered file writer
class FileOutputStream extends OutputStream {
    readonly path: string;

    private fd: number | null;

    // absolute file offset of buffer[0]
    private fileOffset = 0;

    // number of buffer bytes holding data, may lie past the cursor after a seek
    private extent = 0;

    private fileSize = 0;

    constructor(path: string, chunkSize = 64 * 1024) {
        super();
        this.path = path;
        this.fd = openForWrite(path);
        this.setBuffer(new Uint8Array(Math.max(1, chunkSize)));
    }

    get position() {
        return this.fileOffset + this.cursor;
    }

    protected written(start: number, end: number) {
        if (end > this.extent) this.extent = end;
    }

    protected reserve(size: number) {
        this.flushBuffer();
        if (size > this.buffer.length) {
            this.setBuffer(new Uint8Array(size));
        }
    }

    private flushBuffer() {
        if (this.fd === null) {
            throw new IOError(`write to closed file '${this.path}'`);
        }
        if (this.extent > 0) {
            writeFully(this.fd, this.buffer.subarray(0, this.extent), this.fileOffset, this.path);
            this.fileSize = Math.max(this.fileSize, this.fileOffset + this.extent);
        }
        this.fileOffset += this.cursor;
        this.cursor = 0;
        this.extent = 0;
    }

    seek(offset: number, origin: SeekOrigin = 'begin') {
        const end = Math.max(this.fileSize, this.fileOffset + this.extent);
        const from = origin === 'begin' ? 0 : origin === 'current' ? this.position : end;
        const target = from + offset;
        if (target < 0 || this.fd === null) {
            return -1;
        }

        if (target >= this.fileOffset && target <= this.fileOffset + this.extent) {
            this.cursor = target - this.fileOffset;
        } else {
            this.flushBuffer();
            this.fileOffset = target;
        }
        return target;
    }

    flush() {
        if (this.fd !== null) {
            this.flushBuffer();
        }
    }

    close() {
        if (this.fd === null) {
            return;
        }
        const fd = this.fd;
        try {
            this.flushBuffer();
        } finally {
            this.fd = null;
            closeSync(fd);
        }
    }
}

export { SeekOrigin, OutputStream, BufferOutputStream, MappedFileOutputStream, FileOutputStream };
