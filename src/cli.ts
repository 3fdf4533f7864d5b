import { randomBytes } from 'crypto';
import { existsSync, renameSync, rmSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import { hrtime } from 'node:process';
import { parseArgs } from 'node:util';

import { Vec3 } from 'playcanvas';

import { version } from '../package.json';
import { emitHeader } from './header';
import { PlyFormat } from './ply';
import { DEFAULT_RESERVE_SIZE, PlyFileReader, withPlyReader, withPlyWriter } from './ply-file';
import { ProcessAction, processDataTable } from './process';
import { PlyData, readPly } from './readers/read-ply';
import { writePly } from './writers/write-ply';

type Options = {
    format: PlyFormat | null,
    mapping: boolean,
    reserveSize: number,
    comments: string[],
    info: boolean,
    overwrite: boolean,
    help: boolean,
    version: boolean
};

const parseArguments = (args: string[]) => {
    const { values: v, tokens } = parseArgs({
        args,
        tokens: true,
        strict: true,
        allowPositionals: true,
        options: {
            // global options
            ascii: { type: 'boolean', short: 'a' },
            binary: { type: 'boolean', short: 'b' },
            mapping: { type: 'boolean', short: 'm' },
            reserve: { type: 'string', short: 'R' },
            comment: { type: 'string', short: 'c', multiple: true },
            info: { type: 'boolean', short: 'i' },
            overwrite: { type: 'boolean', short: 'w' },
            help: { type: 'boolean', short: 'h' },
            version: { type: 'boolean', short: 'v' },

            // actions
            translate: { type: 'string', short: 't', multiple: true },
            rotate: { type: 'string', short: 'r', multiple: true },
            scale: { type: 'string', short: 's', multiple: true }
        }
    });

    const parseNumber = (value: string): number => {
        const result = Number(value);
        if (value.trim() === '' || isNaN(result)) {
            throw new Error(`Invalid number value: ${value}`);
        }
        return result;
    };

    const parseInteger = (value: string): number => {
        const result = Number(value);
        if (!/^\d+$/.test(value) || !Number.isSafeInteger(result)) {
            throw new Error(`Invalid integer value: ${value}`);
        }
        return result;
    };

    const parseVec3 = (value: string): Vec3 => {
        const parts = value.split(',').map(Number);
        if (parts.length !== 3 || parts.some(isNaN)) {
            throw new Error(`Invalid Vec3 value: ${value}`);
        }
        return new Vec3(parts[0], parts[1], parts[2]);
    };

    if (v.ascii && v.binary) {
        throw new Error('Options --ascii and --binary are mutually exclusive');
    }

    const options: Options = {
        format: v.ascii ? 'ascii' : v.binary ? 'binary' : null,
        mapping: v.mapping ?? false,
        reserveSize: v.reserve === undefined ? DEFAULT_RESERVE_SIZE : parseInteger(v.reserve),
        comments: v.comment ?? [],
        info: v.info ?? false,
        overwrite: v.overwrite ?? false,
        help: v.help ?? false,
        version: v.version ?? false
    };

    const files: string[] = [];
    const actions: ProcessAction[] = [];

    for (const t of tokens) {
        if (t.kind === 'positional') {
            files.push(t.value);
        } else if (t.kind === 'option' && t.value !== undefined) {
            switch (t.name) {
                case 'translate':
                    actions.push({
                        kind: 'translate',
                        value: parseVec3(t.value)
                    });
                    break;
                case 'rotate':
                    actions.push({
                        kind: 'rotate',
                        value: parseVec3(t.value)
                    });
                    break;
                case 'scale': {
                    const value = parseNumber(t.value);
                    if (value <= 0) {
                        throw new Error(`Invalid scale value: ${t.value}`);
                    }
                    actions.push({
                        kind: 'scale',
                        value
                    });
                    break;
                }
            }
        }
    }

    return { files, actions, options };
};

const usage = `
Convert and transform PLY files
===============================

USAGE
  ply-columnar [GLOBAL] <input.ply> [ACTIONS] <output.ply>
  ply-columnar -i <input.ply>

  • ACTIONS are applied to the vertex element in the order listed.

ACTIONS (can be repeated, in any order)
    -t, --translate  x,y,z                  Translate vertices by (x, y, z)
    -r, --rotate     x,y,z                  Rotate vertices by Euler angles (deg)
    -s, --scale      x                      Uniformly scale vertices by factor x

GLOBAL OPTIONS
    -a, --ascii                             Write ascii output.
    -b, --binary                            Write binary little-endian output. Default is the input's format.
    -m, --mapping                           Use mapped file streams.
    -R, --reserve    <bytes>                Bytes reserved up front for mapped output. Default is 104857600.
    -c, --comment    <text>                 Add a comment to the output header. Can be repeated.
    -i, --info                              Print the header of the input file and exit.
    -w, --overwrite                         Overwrite output file if it already exists. Default is false.
    -h, --help                              Show this help and exit.
    -v, --version                           Show version and exit.

EXAMPLES
    # Convert to ascii
    ply-columnar -a mesh.ply mesh_ascii.ply

    # Scale then translate, overwriting if necessary
    ply-columnar -w cloud.ply -s 0.5 -t 0,0,10 cloud_moved.ply
`;

const printInfo = (filename: string, mapping: boolean) => {
    withPlyReader(filename, { mapping }, (reader) => {
        console.log(emitHeader(reader.parseHeader(), reader.handler).trimEnd());
    });
};

const readFile = (filename: string, mapping: boolean) => {
    console.log(`reading '${filename}'...`);

    const reader = new PlyFileReader(filename, { mapping });
    try {
        return { format: reader.format, plyData: readPly(reader) };
    } finally {
        reader.close();
    }
};

const writeFile = (filename: string, plyData: PlyData, format: PlyFormat, options: Options) => {
    console.log(`writing '${filename}'...`);

    // write to a temporary file and rename on success
    const tmpFilename = `.${basename(filename)}.${process.pid}.${Date.now()}.${randomBytes(6).toString('hex')}.tmp`;
    const tmpPathname = join(dirname(filename), tmpFilename);

    try {
        withPlyWriter(tmpPathname, { format, mapping: options.mapping, reserveSize: options.reserveSize }, (writer) => {
            writePly(writer, plyData);
        });
    } catch (err) {
        rmSync(tmpPathname, { force: true });
        throw err;
    }

    renameSync(tmpPathname, filename);
};

// returns the process exit code
const main = (args: string[] = process.argv.slice(2)): number => {
    console.log(`ply-columnar v${version}`);

    const startTime = hrtime();

    let parsed: ReturnType<typeof parseArguments>;
    try {
        parsed = parseArguments(args);
    } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        console.error(usage);
        return 1;
    }

    const { files, actions, options } = parsed;

    // show version and exit
    if (options.version) {
        return 0;
    }

    if (options.help) {
        console.log(usage);
        return 0;
    }

    try {
        if (options.info) {
            if (files.length !== 1) {
                console.error(usage);
                return 1;
            }
            printInfo(resolve(files[0]), options.mapping);
            return 0;
        }

        if (files.length !== 2) {
            console.error(usage);
            return 1;
        }

        const [inputFilename, outputFilename] = files.map(f => resolve(f));

        // check overwrite before doing any work
        if (!options.overwrite && existsSync(outputFilename)) {
            console.error(`File '${outputFilename}' already exists. Use -w option to overwrite.`);
            return 1;
        }

        const { format, plyData } = readFile(inputFilename, options.mapping);

        if (actions.length > 0) {
            const vertex = plyData.elements.find(e => e.name === 'vertex');
            if (!vertex) {
                throw new Error(`No vertex element in file '${inputFilename}'`);
            }
            processDataTable(vertex.dataTable, actions);
        }

        plyData.comments.push(...options.comments);

        writeFile(outputFilename, plyData, options.format ?? format, options);
    } catch (err) {
        // handle errors
        console.error(err);
        return 1;
    }

    const endTime = hrtime(startTime);

    console.log(`done in ${endTime[0] + endTime[1] / 1e9}s`);

    return 0;
};

export { main, parseArguments };
