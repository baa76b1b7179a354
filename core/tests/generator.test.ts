import { ProgramReader } from '../src/gcode/ProgramReader';
import { GCodeGenerator, generateProgram } from '../src/program/GCodeGenerator';
import { GenerationErrorCode } from '../src/types';
import { SPEC_FIXTURES } from './fixtures/spec-fixtures';
import { captureError, motionRecords, programLines, recordsByLayer } from './helpers/program-helpers';

describe('GCodeGenerator', () => {
  describe('scenarios', () => {
    test('should trace a rectangle between units and program end', () => {
      const { text, stats } = generateProgram(SPEC_FIXTURES.rectangle);

      expect(programLines(text)).toEqual([
        'G21 G17 G90',
        'G0 X0 Y0',
        '(shape 1: rectangle 10 x 5)',
        'G1 X10 F100',
        'G1 Y5',
        'G1 X0',
        'G1 Y0',
        'M2'
      ]);
      expect(stats).toEqual({
        instructionCount: 8,
        families: { programStart: 1, motion: 5, state: 0, comment: 1, programEnd: 1 },
        motions: { G0: 1, G1: 4, G2: 0, G3: 0 },
        shapeCount: 1,
        layerCount: 1
      });
    });

    test('should emit a full native circle as exactly one arc', () => {
      const { text, stats } = generateProgram({ shape: 'circle', radius: 5, chordTolerance: 0.01, arcMode: 'native' });

      expect(stats.motions.G2 + stats.motions.G3).toBe(1);
      expect(programLines(text)).toEqual([
        'G21 G17 G90',
        'G0 X0 Y0',
        '(shape 1: circle r5)',
        'G1 X5 F100',
        'G3 X5 Y0 I-5 J0',
        'M2'
      ]);
    });

    test('should repeat a layered line at Z = 0, 2, 4', () => {
      const withoutHeight = { shape: 'line', length: 10, layers: 3 };
      expect(captureError(() => generateProgram(withoutHeight)).code).toBe(GenerationErrorCode.InvalidSpec);

      const { text, stats } = generateProgram({ shape: 'line', length: 10, layers: 3, layerHeight: 2 });
      expect(stats.layerCount).toBe(3);
      expect(programLines(text)).toEqual([
        'G21 G17 G90',
        'G0 X0 Y0 Z0',
        '(shape 1: line 10 long at 0 deg)',
        '(layer 1/3 Z0)',
        'G1 X10 F100',
        '(layer 2/3 Z2)',
        'G0 X0 Z2',
        'G1 X10',
        '(layer 3/3 Z4)',
        'G0 X0 Z4',
        'G1 X10',
        'M2'
      ]);
    });

    test('should fail with ProgramTooLarge instead of truncating', () => {
      const generator = new GCodeGenerator();
      const onComplete = jest.fn();
      generator.on('complete', onComplete);

      const error = captureError(() => generator.generate({ ...SPEC_FIXTURES.decagon, maxInstructions: 5 }));

      expect(error.code).toBe(GenerationErrorCode.ProgramTooLarge);
      expect(error.details).toEqual({ limit: 5, count: 6 });
      expect(onComplete).not.toHaveBeenCalled();
      expect(generator.generate(SPEC_FIXTURES.decagon).stats.instructionCount).toBe(15);
    });
  });

  describe('program shape', () => {
    test('should set up the tool, cut with compensation and retract to safe Z', () => {
      const { text } = generateProgram({
        ...SPEC_FIXTURES.rectangle,
        safeZ: 5,
        programName: 'sample part',
        tool: { number: 2, spindleSpeed: 12000, coolant: 'flood', compensation: 'left' },
        dialect: { programEnd: 'M30' }
      });

      expect(programLines(text)).toEqual([
        'G21 G17 G90',
        '(sample part)',
        'M6 T2',
        'M3 S12000',
        'M8',
        'G0 X0 Y0 Z5',
        '(shape 1: rectangle 10 x 5)',
        'G0 Z0',
        'G41 D2',
        'G1 X10 F100',
        'G1 Y5',
        'G1 X0',
        'G1 Y0',
        'G40',
        'G0 Z5',
        'M5',
        'M9',
        'M30'
      ]);
    });

    test('should write relative extrusion after resetting the extruder', () => {
      const { text } = generateProgram({
        shape: 'polygon',
        vertices: [
          { x: 0, y: 0 },
          { x: 10, y: 0 }
        ],
        closed: false,
        feedRate: 1200,
        extrusion: { perUnit: 0.05, relative: true }
      });

      expect(programLines(text)).toEqual([
        'G21 G17 G90',
        'M83',
        'G92 E0',
        'G0 X0 Y0',
        '(shape 1: polygon 2 vertices open)',
        'G1 X10 E0.5 F1200',
        'M2'
      ]);
    });

    test('should number lines and use semicolon comments when asked', () => {
      const { text } = generateProgram({
        shape: 'line',
        to: { x: 5, y: 0 },
        feedRate: 50,
        lineNumbers: true,
        commentStyle: 'semicolon'
      });

      expect(text).toBe('N1 G21 G17 G90\nN2 G0 X0 Y0\n; shape 1: line to 5, 0\nN3 G1 X5 F50\nN4 M2\n');
    });

    test('should select inch units', () => {
      const { text } = generateProgram({ ...SPEC_FIXTURES.rectangle, units: 'inch' });
      expect(programLines(text)[0]).toBe('G20 G17 G90');
    });

    test('should produce a program the reader accepts cleanly', () => {
      const { text, stats } = generateProgram(SPEC_FIXTURES.milledPart);
      const summary = new ProgramReader().parse(text);

      expect(programLines(text).slice(0, 8)).toEqual([
        'G21 G17 G90',
        'M6 T1',
        'M3 S18000',
        'M7',
        'G0 X0 Y0 Z5',
        '(shape 1 outline: rectangle 40 x 20 r3)',
        'G0 Z0',
        'G1 X3 F600'
      ]);
      expect(text.endsWith('G0 Z5\nM5\nM9\nM2\n')).toBe(true);
      expect(stats.motions.G3).toBe(7);
      expect(stats.motions.G2).toBe(0);
      expect(stats.families.comment).toBe(3);
      expect(summary.success).toBe(true);
      expect(summary.warnings).toEqual([]);
      expect(summary.boundingBox.size.x).toBeCloseTo(40, 3);
      expect(summary.boundingBox.size.y).toBeCloseTo(20, 3);
      expect(summary.boundingBox.size.z).toBe(5);
    });
  });

  describe('arcs below output precision', () => {
    test('should leave out an arc too small to show', () => {
      const { text } = generateProgram({ shape: 'arc', radius: 0.0004, sweep: 90, feedRate: 100 });
      expect(programLines(text)).toEqual(['G21 G17 G90', 'G0 X0 Y0', '(shape 1: arc r0 sweep 90)', 'M2']);
    });

    test('should lead in to the next shape when the first writes nothing', () => {
      const { text } = generateProgram({
        shapes: [
          { kind: 'arc', radius: 0.0004, sweep: 90 },
          { kind: 'rectangle', width: 2, height: 2, origin: { x: 20, y: 0 } }
        ]
      });

      expect(programLines(text).slice(1, 6)).toEqual([
        'G0 X0 Y0',
        '(shape 1: arc r0 sweep 90)',
        '(shape 2: rectangle 2 x 2)',
        'G1 X20 F100',
        'G1 X22'
      ]);
    });

    test('should write corners that round to nothing as plain lines', () => {
      const { text, stats } = generateProgram({ ...SPEC_FIXTURES.rectangle, cornerRadius: 0.0003 });

      expect(stats.motions).toEqual({ G0: 1, G1: 4, G2: 0, G3: 0 });
      expect(programLines(text).slice(3)).toEqual(['G1 X10 F100', 'G1 Y5', 'G1 X0', 'G1 Y0', 'M2']);
    });

    test('should write no arc the reader would take for a full circle', () => {
      const { text } = generateProgram({ ...SPEC_FIXTURES.rectangle, cornerRadius: 0.0006 });
      const { blocks } = new ProgramReader().parse(text);

      blocks.forEach((block, i) => {
        if (!block.gCodes.includes(2) && !block.gCodes.includes(3)) return;
        expect(block.position).not.toEqual(blocks[i - 1].position);
      });
    });
  });

  describe('sample programs', () => {
    const sample = {
      sample: { seed: 1, kinds: ['rectangle'], size: { min: 8, max: 8 } },
      tool: { number: 1, spindleSpeed: 10000, chipLoad: 0.01 }
    };

    test('should build a named program from the drawn shape and the derived feed', () => {
      const { text } = generateProgram(sample);

      expect(programLines(text).slice(0, 7)).toEqual([
        'G21 G17 G90',
        '(sample rectangle 8)',
        'M6 T1',
        'M3 S10000',
        'G0 X0 Y0',
        '(shape 1: rectangle 8 x 8 r1.6)',
        'G1 X1.6 F100'
      ]);
    });

    test('should give the same program for the same seed', () => {
      const open = {
        sample: { seed: 77 },
        tool: {
          number: 2,
          diameter: 0.25,
          surfaceSpeed: { min: 150, max: 450 },
          chipLoad: { min: 0.0005, max: 0.002 },
          compensation: 'random'
        }
      };
      const { text } = generateProgram(open);

      expect(generateProgram(open).text).toBe(text);
      expect(new ProgramReader().parse(text).success).toBe(true);
    });
  });

  describe('events', () => {
    test('should report shapes, layers and completion', () => {
      const generator = new GCodeGenerator();
      const shapes = jest.fn();
      const layers = jest.fn();
      const complete = jest.fn();
      generator.on('shapeStart', shapes);
      generator.on('layerStart', layers);
      generator.on('complete', complete);

      const { stats } = generator.generate(SPEC_FIXTURES.layeredLine);

      expect(shapes).toHaveBeenCalledTimes(1);
      expect(shapes).toHaveBeenCalledWith({ index: 0, kind: 'line', name: undefined, layers: 3 });
      expect(layers.mock.calls.map(([event]) => event.z)).toEqual([0, 2, 4]);
      expect(complete).toHaveBeenCalledWith(stats);
    });
  });

  describe('properties', () => {
    const fixtures = Object.entries(SPEC_FIXTURES);

    test.each(fixtures)('should generate %s deterministically', (_name, spec) => {
      expect(generateProgram(spec).text).toBe(new GCodeGenerator().generate(spec).text);
    });

    // Position the controller is at when the first G1/G2/G3 starts
    const firstFeedStart = (text: string) => {
      const { blocks } = new ProgramReader().parse(text);
      const firstFeed = blocks.findIndex(block => [1, 2, 3].some(code => block.gCodes.includes(code)));
      return blocks[firstFeed - 1].position;
    };

    test('should start the first feed move at the declared start position', () => {
      const { text } = generateProgram({ ...SPEC_FIXTURES.rectangle, startPosition: { x: 3, y: 4 } });
      const { blocks } = new ProgramReader().parse(text);
      const firstFeed = blocks.findIndex(block => block.gCodes.includes(1));

      expect(blocks[0].position).toEqual({ x: 0, y: 0, z: 0 });
      expect(blocks[firstFeed - 1].position).toEqual({ x: 3, y: 4, z: 0 });
      expect(blocks[firstFeed].position).toEqual({ x: 13, y: 4, z: 0 });
    });

    test('should lead in from the start position to a shape that begins elsewhere', () => {
      const { text } = generateProgram({ shape: 'circle', radius: 5 });

      expect(programLines(text)[3]).toBe('G1 X5 F100');
      expect(firstFeedStart(text)).toEqual({ x: 0, y: 0, z: 0 });
    });

    test.each(fixtures)('should start the first feed move of %s at its start position', (_name, spec) => {
      const start = 'startPosition' in spec ? spec.startPosition : { x: 0, y: 0, z: 0 };
      expect(firstFeedStart(generateProgram(spec).text)).toEqual({ x: start.x, y: start.y, z: start.z });
    });

    test('should keep linearized chords within the chord tolerance', () => {
      const { text } = generateProgram({
        shape: 'circle',
        radius: 5,
        chordTolerance: 0.01,
        arcMode: 'linearized',
        precision: 6,
        feedRate: 100
      });
      const { blocks } = new ProgramReader().parse(text);
      let chords = 0;

      for (let i = 1; i < blocks.length; i++) {
        if (!blocks[i].gCodes.includes(1)) continue;
        const from = blocks[i - 1].position;
        const to = blocks[i].position;
        const mid = { x: (from.x + to.x) / 2, y: (from.y + to.y) / 2 };
        expect(5 - Math.hypot(mid.x, mid.y)).toBeLessThanOrEqual(0.01 + 1e-5);
        chords++;
      }
      expect(chords).toBe(50);
    });

    test('should repeat the planar path of every layer, shifted only in Z', () => {
      const { instructions } = generateProgram(SPEC_FIXTURES.noisyPrint);
      const layers = recordsByLayer(instructions).map(records =>
        motionRecords(records).filter(record => record.opcode === 'G1')
      );
      const planar = (records: typeof layers[number]) => records.map(({ args }) => [args.X, args.Y]);

      expect(layers).toHaveLength(4);
      layers.forEach((records, k) => {
        expect(records).toHaveLength(6);
        expect(planar(records)).toEqual(planar(layers[0]));
        expect(records.every(({ args }) => args.Z === [0.2, 0.4, 0.6, 0.8][k])).toBe(true);
      });
    });

    test('should never restate the active feed rate', () => {
      for (const spec of [SPEC_FIXTURES.milledPart, SPEC_FIXTURES.noisyPrint, SPEC_FIXTURES.layeredLine]) {
        let feed: number | undefined;
        for (const record of motionRecords(generateProgram(spec).instructions)) {
          if (record.args.F === undefined) continue;
          expect(record.args.F).not.toBe(feed);
          feed = record.args.F;
        }
      }
    });
  });
});
