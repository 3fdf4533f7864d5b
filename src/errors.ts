// base class for every error raised by the codec
class PlyError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'PlyError';
    }
}

// malformed or unsupported header, magic/format mismatch, unknown scalar
// kind, duplicate element registration or header state violations
class FormatError extends PlyError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'FormatError';
    }
}

// column specs that cannot be reconciled with an element schema
class BindError extends PlyError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'BindError';
    }
}

// malformed ascii numeric token
class ParseError extends PlyError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ParseError';
    }
}

// open/map/read/write failures and reads past the end of a stream
class IOError extends PlyError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'IOError';
    }
}

const describeCause = (err: unknown) => {
    return err instanceof Error ? err.message : String(err);
};

export { PlyError, FormatError, BindError, ParseError, IOError, describeCause };
