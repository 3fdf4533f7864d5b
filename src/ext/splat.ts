import { bindReader, bindWriter } from '../bind';
import { BindError } from '../errors';
import { PlyFileReaderOptions, PlyFileWriterOptions, withPlyReader, withPlyWriter } from '../ply-file';
import { ColumnSpec, ScalarSpec } from '../specs';

const positionNames = ['x', 'y', 'z'];
const scaleNames = ['scale_0', 'scale_1', 'scale_2'];
const rotationNames = ['rot_0', 'rot_1', 'rot_2', 'rot_3'];
const shDCNames = ['f_dc_0', 'f_dc_1', 'f_dc_2'];
const shNames = new Array(45).fill('').map((_, i) => `f_rest_${i}`);

// gaussian splat attributes, flat per splat: 3 positions, 3 log scales,
// 4 rotation quaternion values (w first), 1 opacity, 3 dc and optionally 45
// higher order spherical harmonic coefficients
type GaussianSplatData = {
    positions: Float32Array;
    scales: Float32Array;
    rotations: Float32Array;
    opacities: Float32Array;
    shDC: Float32Array;
    shRest?: Float32Array;
};

const createSpecs = (splat: GaussianSplatData): ColumnSpec[] => {
    const specs: ColumnSpec[] = [
        new ScalarSpec('vertex', 'float32', positionNames, splat.positions),
        new ScalarSpec('vertex', 'float32', scaleNames, splat.scales),
        new ScalarSpec('vertex', 'float32', rotationNames, splat.rotations),
        new ScalarSpec('vertex', 'float32', ['opacity'], splat.opacities),
        new ScalarSpec('vertex', 'float32', shDCNames, splat.shDC)
    ];
    if (splat.shRest) {
        specs.push(new ScalarSpec('vertex', 'float32', shNames, splat.shRest));
    }
    return specs;
};

const loadGaussianSplat = (path: string, options: PlyFileReaderOptions = {}): GaussianSplatData => {
    return withPlyReader(path, options, (reader) => {
        const vertex = reader.getElement('vertex');
        if (!vertex) {
            throw new BindError(`missing element 'vertex' in '${path}'`);
        }

        const count = vertex.count;
        const splat: GaussianSplatData = {
            positions: new Float32Array(count * 3),
            scales: new Float32Array(count * 3),
            rotations: new Float32Array(count * 4),
            opacities: new Float32Array(count),
            shDC: new Float32Array(count * 3)
        };

        if (shNames.every(name => vertex.properties.some(p => p.name === name))) {
            splat.shRest = new Float32Array(count * shNames.length);
        }

        bindReader(reader, ...createSpecs(splat));

        return splat;
    });
};

const saveGaussianSplat = (path: string, splat: GaussianSplatData, options: PlyFileWriterOptions = {}) => {
    const specs = createSpecs(splat);
    withPlyWriter(path, options, (writer) => {
        bindWriter(writer, ...specs);
    });
};

export { GaussianSplatData, loadGaussianSplat, saveGaussianSplat };
