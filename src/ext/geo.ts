import { readFileSync, writeFileSync } from 'node:fs';

import { FormatError, IOError, describeCause } from '../errors';
import { createFormatHandler } from '../format-handler';
import { emitHeader, parseHeader } from '../header';
import { PlyFileReader, PlyFileReaderOptions, PlyFileWriter, detectFormat } from '../ply-file';
import { BufferInputStream } from '../streams/input-stream';

type GeoReference = {
    label: string;
    srid: number;
    bbox: [number, number, number, number, number, number];     // min x,y,z then max x,y,z
    offset: [number, number, number];
    scale: [number, number, number];
};

const geoPrefix = 'geo ';
const texturePrefix = 'TextureFile ';

const geoPattern = /^geo srid=(\S+) bbox=(\S+) offset=(\S+) scale=(\S+) label=(.*)$/;

const isGeoComment = (comment: string) => comment.startsWith(geoPrefix);

const parseNumbers = (text: string, count: number, field: string) => {
    const values = text.split(',').map(Number);
    if (values.length !== count || values.some(v => Number.isNaN(v))) {
        throw new FormatError(`invalid geo ${field} '${text}'`);
    }
    return values;
};

// geo srid=<int> bbox=<6 numbers> offset=<3 numbers> scale=<3 numbers> label=<text>
const formatGeoComment = (geo: GeoReference) => {
    if (!Number.isInteger(geo.srid)) {
        throw new FormatError(`invalid geo srid ${geo.srid}`);
    }
    if (/[\r\n]/.test(geo.label)) {
        throw new FormatError('geo label cannot contain line breaks');
    }
    return `${geoPrefix}srid=${geo.srid} bbox=${geo.bbox.join(',')} offset=${geo.offset.join(',')} scale=${geo.scale.join(',')} label=${geo.label}`;
};

// returns null for comments that are not geo references
const parseGeoComment = (comment: string): GeoReference | null => {
    if (!isGeoComment(comment)) {
        return null;
    }

    const match = geoPattern.exec(comment);
    if (!match) {
        throw new FormatError(`malformed geo comment '${comment}'`);
    }

    const [srid] = parseNumbers(match[1], 1, 'srid');
    if (!Number.isInteger(srid)) {
        throw new FormatError(`invalid geo srid '${match[1]}'`);
    }
    const b = parseNumbers(match[2], 6, 'bbox');
    const o = parseNumbers(match[3], 3, 'offset');
    const s = parseNumbers(match[4], 3, 'scale');

    return {
        label: match[5],
        srid,
        bbox: [b[0], b[1], b[2], b[3], b[4], b[5]],
        offset: [o[0], o[1], o[2]],
        scale: [s[0], s[1], s[2]]
    };
};

class GeoPlyFileReader extends PlyFileReader {
    // the first geo reference comment, or null when the file has none
    parseGeoHeader(): GeoReference | null {
        for (const comment of this.comments) {
            const geo = parseGeoComment(comment);
            if (geo) {
                return geo;
            }
        }
        return null;
    }

    parseTexturePaths(): string[] {
        return this.comments
        .filter(c => c.startsWith(texturePrefix))
        .map(c => c.substring(texturePrefix.length));
    }
}

class GeoPlyFileWriter extends PlyFileWriter {
    addGeoHeader(geo: GeoReference) {
        this.addComment(formatGeoComment(geo));
    }

    addTexturePaths(paths: readonly string[]) {
        paths.forEach(p => this.addComment(`${texturePrefix}${p}`));
    }
}

// rewrite the header of an existing file with geo placed first among the
// comments, replacing any geo comment it already has. row data is copied
// byte for byte.
const insertGeoHeader = (path: string, geo: GeoReference) => {
    const handler = createFormatHandler(detectFormat(path));

    let data: Uint8Array;
    try {
        data = readFileSync(path);
    } catch (err) {
        throw new IOError(`failed to read file '${path}': ${describeCause(err)}`, { cause: err });
    }

    const input = new BufferInputStream(data);
    const header = parseHeader(input, handler);
    const body = data.subarray(input.position);

    const text = emitHeader({
        comments: [formatGeoComment(geo), ...header.comments.filter(c => !isGeoComment(c))],
        elements: header.elements
    }, handler);

    const head = new TextEncoder().encode(text);
    const result = new Uint8Array(head.length + body.length);
    result.set(head);
    result.set(body, head.length);

    try {
        writeFileSync(path, result);
    } catch (err) {
        throw new IOError(`failed to write file '${path}': ${describeCause(err)}`, { cause: err });
    }
};

const fetchGeoHeader = (path: string, options: PlyFileReaderOptions = {}): GeoReference | null => {
    const reader = new GeoPlyFileReader(path, options);
    try {
        return reader.parseGeoHeader();
    } finally {
        reader.close();
    }
};

export {
    GeoReference,
    formatGeoComment,
    parseGeoComment,
    GeoPlyFileReader,
    GeoPlyFileWriter,
    insertGeoHeader,
    fetchGeoHeader
};
