export { PlyError, FormatError, BindError, ParseError, IOError } from './errors';
export type { IntegerKind, NumericKind, ScalarKind, TypedArray, TypedArrayFor, PlyScalar } from './scalar';
export { scalarKindToString, scalarKindFromString, byteSize, castScalar, makeScalar, plyCast } from './scalar';
export type { PlyFormat, PlyProperty, PlyElement, PlyHeader } from './ply';
export { isListProperty, scalarProperty, listProperty } from './ply';
export type { FormatHandler } from './format-handler';
export { BinaryHandler, AsciiHandler, createFormatHandler } from './format-handler';
export { parseHeader, emitHeader } from './header';
export type { SeekOrigin } from './streams/output-stream';
export { InputStream, BufferInputStream, MappedFileInputStream, FileInputStream } from './streams/input-stream';
export { OutputStream, BufferOutputStream, MappedFileOutputStream, FileOutputStream } from './streams/output-stream';
export { PlyStreamReader } from './ply-reader';
export { PlyStreamWriter } from './ply-writer';
export type { PlyFileReaderOptions, PlyFileWriterOptions } from './ply-file';
export {
    DEFAULT_RESERVE_SIZE,
    detectFormat,
    openInputStream,
    openOutputStream,
    PlyFileReader,
    PlyFileWriter,
    withPlyReader,
    withPlyWriter
} from './ply-file';
export type { ColumnSpec, ListRow, ListSpecOptions } from './specs';
export { ScalarSpec, ListSpec, checkSpecConflicts } from './specs';
export { bindReader, bindWriter } from './bind';
export type { AnyColumn, Row } from './data-table';
export { Column, ListColumn, DataTable } from './data-table';
export type { PlyData } from './readers/read-ply';
export { readPly } from './readers/read-ply';
export { writePly } from './writers/write-ply';
export type { MeshData } from './ext/mesh';
export { loadMesh, saveMesh } from './ext/mesh';
export type { GaussianSplatData } from './ext/splat';
export { loadGaussianSplat, saveGaussianSplat } from './ext/splat';
export type { GeoReference } from './ext/geo';
export {
    formatGeoComment,
    parseGeoComment,
    GeoPlyFileReader,
    GeoPlyFileWriter,
    insertGeoHeader,
    fetchGeoHeader
} from './ext/geo';
