import { FormatError } from './errors';
import { FormatHandler, createFormatHandler } from './format-handler';
import { emitHeader } from './header';
import { PlyElement, PlyFormat, cloneElement } from './ply';
import { PlyScalar, ScalarKind } from './scalar';
import { OutputStream } from './streams/output-stream';

const checkName = (name: string, what: string) => {
    if (name.length === 0 || /\s/.test(name)) {
        throw new FormatError(`invalid ${what} name '${name}'`);
    }
};

// accumulates a ply schema, emits it once and then writes row data. the
// stream is owned by the writer for its lifetime.
class PlyStreamWriter {
    readonly output: OutputStream;
    readonly format: PlyFormat;
    readonly handler: FormatHandler;

    private _comments: string[] = [];
    private _elements: PlyElement[] = [];
    private headerWritten = false;

    constructor(output: OutputStream, format: PlyFormat = 'binary') {
        this.output = output;
        this.format = format;
        this.handler = createFormatHandler(format);
    }

    get comments(): readonly string[] {
        return this._comments;
    }

    get elements(): readonly PlyElement[] {
        return this._elements;
    }

    get hasHeader() {
        return this.headerWritten;
    }

    addComment(comment: string) {
        if (this.headerWritten) {
            throw new FormatError('cannot add a comment after the ply header was written');
        }
        if (/[\r\n]/.test(comment)) {
            throw new FormatError('ply comments cannot contain line breaks');
        }
        this._comments.push(comment);
    }

    addElement(element: PlyElement) {
        if (this.headerWritten) {
            throw new FormatError(`cannot add element '${element.name}' after the ply header was written`);
        }
        checkName(element.name, 'element');
        element.properties.forEach(p => checkName(p.name, 'property'));
        if (this._elements.some(e => e.name === element.name)) {
            throw new FormatError(`duplicate ply element '${element.name}'`);
        }
        this._elements.push(cloneElement(element));
    }

    writeHeader() {
        if (this.headerWritten) {
            throw new FormatError('ply header already written');
        }
        this.output.writeText(emitHeader({ comments: this._comments, elements: this._elements }, this.handler));
        this.headerWritten = true;
    }

    writeScalar(scalar: PlyScalar, kind?: ScalarKind) {
        this.handler.writeScalar(this.output, scalar, kind);
    }

    writeValue(value: number, kind: ScalarKind) {
        this.handler.writeValue(this.output, value, kind);
    }

    writeLineEnd() {
        this.handler.writeLineEnd(this.output);
    }

    flush() {
        this.output.flush();
    }
}

export { PlyStreamWriter };
