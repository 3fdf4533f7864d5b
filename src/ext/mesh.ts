import { bindReader, bindWriter } from '../bind';
import { BindError } from '../errors';
import { PlyElement } from '../ply';
import { PlyFileReaderOptions, PlyFileWriterOptions, withPlyReader, withPlyWriter } from '../ply-file';
import { ColumnSpec, ListSpec, ScalarSpec } from '../specs';

// per-vertex attributes are flat arrays, 3 values per vertex for positions
// and normals, 1 for the rest. faces are triangles.
type MeshData = {
    positions: Float32Array;
    normals?: Float32Array;
    weights?: Float32Array;
    accuracies?: Float32Array;
    samplings?: Float32Array;
    types?: Uint8Array;
    visibilities?: number[][];
    faces?: Uint32Array[];
};

const positionNames = ['x', 'y', 'z'];
const normalNames = ['nx', 'ny', 'nz'];

const hasProperties = (element: PlyElement, names: readonly string[]) => {
    return names.every(name => element.properties.some(p => p.name === name));
};

const loadMesh = (path: string, options: PlyFileReaderOptions = {}): MeshData => {
    return withPlyReader(path, options, (reader) => {
        const vertex = reader.getElement('vertex');
        if (!vertex) {
            throw new BindError(`missing element 'vertex' in '${path}'`);
        }

        const count = vertex.count;
        const mesh: MeshData = {
            positions: new Float32Array(count * 3)
        };
        const specs: ColumnSpec[] = [
            new ScalarSpec('vertex', 'float32', positionNames, mesh.positions)
        ];

        if (hasProperties(vertex, normalNames)) {
            mesh.normals = new Float32Array(count * 3);
            specs.push(new ScalarSpec('vertex', 'float32', normalNames, mesh.normals));
        }

        if (hasProperties(vertex, ['weight'])) {
            mesh.weights = new Float32Array(count);
            specs.push(new ScalarSpec('vertex', 'float32', ['weight'], mesh.weights));
        }

        if (hasProperties(vertex, ['accuracy'])) {
            mesh.accuracies = new Float32Array(count);
            specs.push(new ScalarSpec('vertex', 'float32', ['accuracy'], mesh.accuracies));
        }

        if (hasProperties(vertex, ['sampling'])) {
            mesh.samplings = new Float32Array(count);
            specs.push(new ScalarSpec('vertex', 'float32', ['sampling'], mesh.samplings));
        }

        if (hasProperties(vertex, ['type'])) {
            mesh.types = new Uint8Array(count);
            specs.push(new ScalarSpec('vertex', 'uint8', ['type'], mesh.types));
        }

        if (hasProperties(vertex, ['visibility'])) {
            mesh.visibilities = [];
            specs.push(new ListSpec('vertex', 'uint32', 'visibility', mesh.visibilities));
        }

        const face = reader.getElement('face');
        if (face && hasProperties(face, ['vertex_indices'])) {
            mesh.faces = [];
            specs.push(new ListSpec('face', 'uint32', 'vertex_indices', mesh.faces, { length: 3 }));
        }

        bindReader(reader, ...specs);

        return mesh;
    });
};

// attributes are written in a fixed order so files from different callers
// share one layout
const saveMesh = (path: string, mesh: MeshData, options: PlyFileWriterOptions = {}) => {
    const specs: ColumnSpec[] = [
        new ScalarSpec('vertex', 'float32', positionNames, mesh.positions)
    ];

    if (mesh.normals) specs.push(new ScalarSpec('vertex', 'float32', normalNames, mesh.normals));
    if (mesh.weights) specs.push(new ScalarSpec('vertex', 'float32', ['weight'], mesh.weights));
    if (mesh.accuracies) specs.push(new ScalarSpec('vertex', 'float32', ['accuracy'], mesh.accuracies));
    if (mesh.samplings) specs.push(new ScalarSpec('vertex', 'float32', ['sampling'], mesh.samplings));
    if (mesh.types) specs.push(new ScalarSpec('vertex', 'uint8', ['type'], mesh.types));
    if (mesh.visibilities) specs.push(new ListSpec('vertex', 'uint32', 'visibility', mesh.visibilities));
    if (mesh.faces) specs.push(new ListSpec('face', 'uint32', 'vertex_indices', mesh.faces));

    withPlyWriter(path, options, (writer) => {
        bindWriter(writer, ...specs);
    });
};

export { MeshData, loadMesh, saveMesh };
