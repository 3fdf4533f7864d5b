import { FormatError } from './errors';

type IntegerKind = 'int8' | 'uint8' | 'int16' | 'uint16' | 'int32' | 'uint32';

type NumericKind = IntegerKind | 'float32' | 'float64';

type ScalarKind = 'unused' | NumericKind;

type TypedArray = Int8Array | Uint8Array | Int16Array | Uint16Array | Int32Array | Uint32Array | Float32Array | Float64Array;

type TypedArrayMap = {
    int8: Int8Array;
    uint8: Uint8Array;
    int16: Int16Array;
    uint16: Uint16Array;
    int32: Int32Array;
    uint32: Uint32Array;
    float32: Float32Array;
    float64: Float64Array;
};

// the typed array holding values of kind K
type TypedArrayFor<K extends NumericKind> = TypedArrayMap[K];

// a numeric value tagged with the kind it was read as (or should be written as)
interface PlyScalar {
    kind: NumericKind;
    value: number;
}

// header tokens: [emitted name, alias]
const kindNames: Record<ScalarKind, readonly [string, string]> = {
    unused: ['unused', 'unused'],
    int8: ['char', 'int8'],
    uint8: ['uchar', 'uint8'],
    int16: ['short', 'int16'],
    uint16: ['ushort', 'uint16'],
    int32: ['int', 'int32'],
    uint32: ['uint', 'uint32'],
    float32: ['float', 'float32'],
    float64: ['double', 'float64']
};

const scalarKinds: readonly ScalarKind[] = ['unused', 'int8', 'uint8', 'int16', 'uint16', 'int32', 'uint32', 'float32', 'float64'];

const scalarKindToString = (kind: ScalarKind): string => kindNames[kind][0];

const scalarKindFromString = (token: string): ScalarKind | null => {
    return scalarKinds.find(kind => kindNames[kind][0] === token || kindNames[kind][1] === token) ?? null;
};

const isIntegerKind = (kind: ScalarKind): kind is IntegerKind => {
    return kind !== 'unused' && kind !== 'float32' && kind !== 'float64';
};

// narrow a header kind to one that can carry values
const numericKind = (kind: ScalarKind): NumericKind => {
    if (kind === 'unused') {
        throw new FormatError('scalar kind \'unused\' carries no values');
    }
    return kind;
};

const getDataType = (kind: NumericKind) => {
    switch (kind) {
        case 'int8': return Int8Array;
        case 'uint8': return Uint8Array;
        case 'int16': return Int16Array;
        case 'uint16': return Uint16Array;
        case 'int32': return Int32Array;
        case 'uint32': return Uint32Array;
        case 'float32': return Float32Array;
        case 'float64': return Float64Array;
    }
};

const byteSize = (kind: NumericKind) => getDataType(kind).BYTES_PER_ELEMENT;

const createTypedArray = <K extends NumericKind>(kind: K, length: number): TypedArrayFor<K> => {
    const arrays: { [P in NumericKind]: (n: number) => TypedArrayMap[P] } = {
        int8: n => new Int8Array(n),
        uint8: n => new Uint8Array(n),
        int16: n => new Int16Array(n),
        uint16: n => new Uint16Array(n),
        int32: n => new Int32Array(n),
        uint32: n => new Uint32Array(n),
        float32: n => new Float32Array(n),
        float64: n => new Float64Array(n)
    };
    return arrays[kind](length);
};

const typedArrayKind = (data: TypedArray): NumericKind => {
    switch (data.constructor) {
        case Int8Array: return 'int8';
        case Uint8Array: return 'uint8';
        case Int16Array: return 'int16';
        case Uint16Array: return 'uint16';
        case Int32Array: return 'int32';
        case Uint32Array: return 'uint32';
        case Float32Array: return 'float32';
    }
    return 'float64';
};

// single-slot arrays perform the store conversion of each kind: integers
// truncate toward zero and wrap, NaN and infinities become 0, float32 rounds
const scratch: { [P in NumericKind]: TypedArrayMap[P] } = {
    int8: new Int8Array(1),
    uint8: new Uint8Array(1),
    int16: new Int16Array(1),
    uint16: new Uint16Array(1),
    int32: new Int32Array(1),
    uint32: new Uint32Array(1),
    float32: new Float32Array(1),
    float64: new Float64Array(1)
};

// unchecked numeric cast into the value range of kind
const castScalar = (value: number, kind: NumericKind): number => {
    const slot = scratch[kind];
    slot[0] = value;
    return slot[0];
};

const makeScalar = (kind: NumericKind, value: number): PlyScalar => {
    return { kind, value: castScalar(value, kind) };
};

const plyCast = (scalar: PlyScalar, kind: NumericKind): number => castScalar(scalar.value, kind);

export {
    IntegerKind,
    NumericKind,
    ScalarKind,
    TypedArray,
    TypedArrayFor,
    PlyScalar,
    scalarKindToString,
    scalarKindFromString,
    isIntegerKind,
    numericKind,
    byteSize,
    createTypedArray,
    typedArrayKind,
    castScalar,
    makeScalar,
    plyCast
};
