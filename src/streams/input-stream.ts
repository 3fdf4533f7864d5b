import { closeSync, openSync, readFileSync, readSync } from 'node:fs';

import { IOError, describeCause } from '../errors';

const decoder = new TextDecoder('utf-8');

// space, \t, \n, \v, \f, \r
const isSpace = (c: number) => c === 32 || (c >= 9 && c <= 13);

// a forward-only byte source. subclasses keep unread bytes in
// buffer[cursor, limit) and refill on demand.
abstract class InputStream {
    protected buffer: Uint8Array = new Uint8Array(0);
    protected cursor = 0;
    protected limit = 0;

    // absolute stream offset of buffer[0]
    protected base = 0;

    private view = new DataView(this.buffer.buffer);

    // try to make at least size unread bytes available. returns false when
    // the stream ends first.
    protected abstract fill(size: number): boolean;

    abstract close(): void;

    protected setBuffer(buffer: Uint8Array) {
        this.buffer = buffer;
        this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    }

    get position() {
        return this.base + this.cursor;
    }

    // view over the current buffer; offsets returned by take() index into it
    get dataView() {
        return this.view;
    }

    // consume size bytes and return their offset in dataView
    take(size: number): number {
        if (this.limit - this.cursor < size && !this.fill(size)) {
            throw new IOError(`unexpected end of stream: needed ${size} bytes at offset ${this.position}`);
        }
        const offset = this.cursor;
        this.cursor += size;
        return offset;
    }

    // the returned view is only valid until the next read
    readBytes(size: number): Uint8Array {
        const offset = this.take(size);
        return this.buffer.subarray(offset, offset + size);
    }

    // read up to and including the next '\n'. the terminator and a trailing
    // '\r' are dropped. returns null at end of stream.
    readLine(): string | null {
        let scanned = 0;
        for (;;) {
            const nl = this.buffer.subarray(this.cursor + scanned, this.limit).indexOf(10);
            if (nl !== -1) {
                const end = this.cursor + scanned + nl;
                const line = this.decode(this.cursor, end);
                this.cursor = end + 1;
                return line;
            }

            scanned = this.limit - this.cursor;
            if (!this.fill(scanned + 1)) {
                if (this.cursor === this.limit) {
                    return null;
                }
                const line = this.decode(this.cursor, this.limit);
                this.cursor = this.limit;
                return line;
            }
        }
    }

    // read the next whitespace-delimited token. returns null at end of stream.
    readToken(): string | null {
        for (;;) {
            if (this.cursor === this.limit && !this.fill(1)) {
                return null;
            }
            if (!isSpace(this.buffer[this.cursor])) {
                break;
            }
            this.cursor++;
        }

        let length = 0;
        for (;;) {
            if (this.cursor + length === this.limit && !this.fill(length + 1)) {
                break;
            }
            if (isSpace(this.buffer[this.cursor + length])) {
                break;
            }
            length++;
        }

        let token = '';
        for (let i = 0; i < length; ++i) {
            token += String.fromCharCode(this.buffer[this.cursor + i]);
        }
        this.cursor += length;
        return token;
    }

    private decode(start: number, end: number) {
        if (end > start && this.buffer[end - 1] === 13) {
            end--;
        }
        return decoder.decode(this.buffer.subarray(start, end));
    }
}

// reads from bytes already in memory
class BufferInputStream extends InputStream {
    constructor(data: Uint8Array) {
        super();
        this.setBuffer(data);
        this.limit = data.length;
    }

    protected fill(size: number) {
        return this.limit - this.cursor >= size;
    }

    close() {
        // nothing to release
    }
}

const loadFile = (path: string) => {
    try {
        return readFileSync(path);
    } catch (err) {
        throw new IOError(`failed to map file '${path}': ${describeCause(err)}`, { cause: err });
    }
};

// the whole file is brought into memory once and every read is a view over
// it, so row data is never copied on its way to the decoder
class MappedFileInputStream extends BufferInputStream {
    readonly path: string;

    constructor(path: string) {
        super(loadFile(path));
        this.path = path;
    }

    close() {
        this.setBuffer(new Uint8Array(0));
        this.cursor = this.limit = 0;
    }
}

const openFile = (path: string) => {
    try {
        return openSync(path, 'r');
    } catch (err) {
        throw new IOError(`failed to open file '${path}': ${describeCause(err)}`, { cause: err });
    }
};

// conventional buffered file reader
class FileInputStream extends InputStream {
    readonly path: string;

    private fd: number | null;

    constructor(path: string, chunkSize = 64 * 1024) {
        super();
        this.path = path;
        this.fd = openFile(path);
        this.setBuffer(new Uint8Array(Math.max(1, chunkSize)));
    }

    protected fill(size: number) {
        if (this.fd === null) {
            return false;
        }

        // move unread bytes to the front
        if (this.cursor > 0) {
            this.buffer.copyWithin(0, this.cursor, this.limit);
            this.base += this.cursor;
            this.limit -= this.cursor;
            this.cursor = 0;
        }

        if (size > this.buffer.length) {
            const grown = new Uint8Array(Math.max(size, this.buffer.length * 2));
            grown.set(this.buffer.subarray(0, this.limit));
            this.setBuffer(grown);
        }

        while (this.limit < size) {
            let bytesRead: number;
            try {
                bytesRead = readSync(this.fd, this.buffer, this.limit, this.buffer.length - this.limit, null);
            } catch (err) {
                throw new IOError(`failed to read file '${this.path}': ${describeCause(err)}`, { cause: err });
            }
            if (bytesRead === 0) {
                return false;
            }
            this.limit += bytesRead;
        }
        return true;
    }

    close() {
        if (this.fd !== null) {
            const fd = this.fd;
            this.fd = null;
            closeSync(fd);
        }
    }
}

export { InputStream, BufferInputStream, MappedFileInputStream, FileInputStream };
