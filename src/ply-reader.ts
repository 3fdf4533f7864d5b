import { FormatHandler, createFormatHandler } from './format-handler';
import { parseHeader } from './header';
import { PlyElement, PlyFormat, PlyHeader } from './ply';
import { PlyScalar, ScalarKind } from './scalar';
import { InputStream } from './streams/input-stream';

// reads a ply header and its row data from one input stream. the stream is
// owned by the reader for its lifetime.
class PlyStreamReader {
    readonly input: InputStream;
    readonly format: PlyFormat;
    readonly handler: FormatHandler;

    private header: PlyHeader | null = null;

    constructor(input: InputStream, format: PlyFormat = 'binary') {
        this.input = input;
        this.format = format;
        this.handler = createFormatHandler(format);
    }

    // parse the header once. later calls return the same schema.
    parseHeader(): PlyHeader {
        if (!this.header) {
            this.header = parseHeader(this.input, this.handler);
        }
        return this.header;
    }

    get comments(): string[] {
        return this.parseHeader().comments;
    }

    get elements(): PlyElement[] {
        return this.parseHeader().elements;
    }

    getElement(name: string): PlyElement | null {
        return this.elements.find(e => e.name === name) ?? null;
    }

    readScalar(kind: ScalarKind): PlyScalar {
        return this.handler.readScalar(this.input, kind);
    }

    readValue(kind: ScalarKind): number {
        return this.handler.readValue(this.input, kind);
    }
}

export { PlyStreamReader };
