import { IOError, ParseError } from './errors';
import { PlyFormat } from './ply';
import { IntegerKind, NumericKind, PlyScalar, ScalarKind, byteSize, castScalar, isIntegerKind, numericKind } from './scalar';
import { InputStream } from './streams/input-stream';
import { OutputStream } from './streams/output-stream';

// one wire encoding of scalar values
interface FormatHandler {
    readonly isBinary: boolean;

    // the second line of the header, e.g. 'format ascii 1.0'
    readonly formatHeader: string;

    readValue(input: InputStream, kind: ScalarKind): number;

    readScalar(input: InputStream, kind: ScalarKind): PlyScalar;

    // value is cast to kind before it is encoded
    writeValue(output: OutputStream, value: number, kind: ScalarKind): void;

    // writes as kind when given, otherwise as the scalar's own kind
    writeScalar(output: OutputStream, scalar: PlyScalar, kind?: ScalarKind): void;

    // terminate the current row
    writeLineEnd(output: OutputStream): void;
}

type ValueReader = (view: DataView, offset: number) => number;
type ValueWriter = (view: DataView, offset: number, value: number) => void;

const binaryReaders: Record<NumericKind, ValueReader> = {
    int8: (v, o) => v.getInt8(o),
    uint8: (v, o) => v.getUint8(o),
    int16: (v, o) => v.getInt16(o, true),
    uint16: (v, o) => v.getUint16(o, true),
    int32: (v, o) => v.getInt32(o, true),
    uint32: (v, o) => v.getUint32(o, true),
    float32: (v, o) => v.getFloat32(o, true),
    float64: (v, o) => v.getFloat64(o, true)
};

const binaryWriters: Record<NumericKind, ValueWriter> = {
    int8: (v, o, x) => v.setInt8(o, x),
    uint8: (v, o, x) => v.setUint8(o, x),
    int16: (v, o, x) => v.setInt16(o, x, true),
    uint16: (v, o, x) => v.setUint16(o, x, true),
    int32: (v, o, x) => v.setInt32(o, x, true),
    uint32: (v, o, x) => v.setUint32(o, x, true),
    float32: (v, o, x) => v.setFloat32(o, x, true),
    float64: (v, o, x) => v.setFloat64(o, x, true)
};

// raw little-endian values, no padding, no row delimiters
class BinaryHandler implements FormatHandler {
    readonly isBinary = true;
    readonly formatHeader = 'format binary_little_endian 1.0';

    readValue(input: InputStream, kind: ScalarKind) {
        const k = numericKind(kind);
        const offset = input.take(byteSize(k));
        return binaryReaders[k](input.dataView, offset);
    }

    readScalar(input: InputStream, kind: ScalarKind): PlyScalar {
        return { kind: numericKind(kind), value: this.readValue(input, kind) };
    }

    writeValue(output: OutputStream, value: number, kind: ScalarKind) {
        const k = numericKind(kind);
        const offset = output.claim(byteSize(k));
        binaryWriters[k](output.dataView, offset, castScalar(value, k));
    }

    writeScalar(output: OutputStream, scalar: PlyScalar, kind: ScalarKind = scalar.kind) {
        this.writeValue(output, scalar.value, kind);
    }

    writeLineEnd(output: OutputStream) {
        // rows are not delimited in binary files
    }
}

const integerRanges: Record<IntegerKind, readonly [number, number]> = {
    int8: [-0x80, 0x7f],
    uint8: [0, 0xff],
    int16: [-0x8000, 0x7fff],
    uint16: [0, 0xffff],
    int32: [-0x80000000, 0x7fffffff],
    uint32: [0, 0xffffffff]
};

const integerToken = /^[+-]?\d+$/;
const floatToken = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const specialToken = /^([+-]?)(nan|inf|infinity)$/i;

// parse one ascii token as kind. locale independent.
const parseToken = (token: string, kind: NumericKind): number => {
    if (isIntegerKind(kind)) {
        if (!integerToken.test(token)) {
            throw new ParseError(`failed to parse ascii value '${token}' as ${kind}`);
        }
        const value = Number(token);
        const [min, max] = integerRanges[kind];
        if (value < min || value > max) {
            throw new ParseError(`ascii value '${token}' is out of range for ${kind}`);
        }
        return value;
    }

    const special = specialToken.exec(token);
    if (special) {
        if (special[2].toLowerCase() === 'nan') {
            return NaN;
        }
        return special[1] === '-' ? -Infinity : Infinity;
    }

    if (!floatToken.test(token)) {
        throw new ParseError(`failed to parse ascii value '${token}' as ${kind}`);
    }

    const value = kind === 'float32' ? Math.fround(Number(token)) : Number(token);
    if (!isFinite(value)) {
        throw new ParseError(`ascii value '${token}' is out of range for ${kind}`);
    }
    return value;
};

// shortest decimal text that reads back as exactly the same value
const formatValue = (value: number, kind: NumericKind): string => {
    if (isIntegerKind(kind)) {
        return String(value);
    }
    if (Number.isNaN(value)) {
        return 'nan';
    }
    if (!isFinite(value)) {
        return value < 0 ? '-inf' : 'inf';
    }
    if (Object.is(value, -0)) {
        return '-0';
    }
    if (kind === 'float32') {
        for (let precision = 1; precision < 9; ++precision) {
            const candidate = Number(value.toPrecision(precision));
            if (Math.fround(candidate) === value) {
                return String(candidate);
            }
        }
        return String(Number(value.toPrecision(9)));
    }
    return String(value);
};

// whitespace separated decimal tokens, one row per line
class AsciiHandler implements FormatHandler {
    readonly isBinary = false;
    readonly formatHeader = 'format ascii 1.0';

    // a separating space follows the last value written on the current line
    private pendingSpace = false;

    readValue(input: InputStream, kind: ScalarKind) {
        const k = numericKind(kind);
        const token = input.readToken();
        if (token === null) {
            throw new IOError(`unexpected end of stream reading ${k} at offset ${input.position}`);
        }
        return parseToken(token, k);
    }

    readScalar(input: InputStream, kind: ScalarKind): PlyScalar {
        return { kind: numericKind(kind), value: this.readValue(input, kind) };
    }

    writeValue(output: OutputStream, value: number, kind: ScalarKind) {
        const k = numericKind(kind);
        output.writeAscii(`${formatValue(castScalar(value, k), k)} `);
        this.pendingSpace = true;
    }

    writeScalar(output: OutputStream, scalar: PlyScalar, kind: ScalarKind = scalar.kind) {
        this.writeValue(output, scalar.value, kind);
    }

    // replace the trailing separator with the line terminator
    writeLineEnd(output: OutputStream) {
        if (this.pendingSpace) {
            if (output.seek(-1, 'current') === -1) {
                throw new IOError(`failed to retract output position at offset ${output.position}`);
            }
            this.pendingSpace = false;
        }
        output.writeAscii('\n');
    }
}

const createFormatHandler = (format: PlyFormat): FormatHandler => {
    return format === 'binary' ? new BinaryHandler() : new AsciiHandler();
};

export { FormatHandler, BinaryHandler, AsciiHandler, createFormatHandler, parseToken, formatValue };
