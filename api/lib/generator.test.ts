import { after, before, describe, test } from 'node:test';
import assert from 'node:assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  findMissingTopologies,
  generateSimulations,
  parseDestinations,
  parseTopologies,
  readDestinations,
  readTopologies,
} from './generator';

function counterIds(): () => string {
  let n = 0;
  return () => `sim-${++n}`;
}

describe('parsing input files', () => {
  test('parseTopologies splits name and stubs, skipping blank lines', () => {
    assert.deepStrictEqual(parseTopologies('net-a.topo|net-a.stubs\n\n  net-b.topo  \n'), [
      { name: 'net-a.topo', stubs: 'net-a.stubs' },
      { name: 'net-b.topo', stubs: '' },
    ]);
  });

  test('parseDestinations reads one integer per line', () => {
    assert.deepStrictEqual(parseDestinations('10\r\n 20 \n\n3\n'), [10, 20, 3]);
  });

  test('parseDestinations rejects non-integer lines', () => {
    assert.throws(() => parseDestinations('10\nabc\n'), /Invalid destination on line 2: "abc"/);
  });
});

describe('generateSimulations', () => {
  const base = {
    topologies: [
      { name: 'net-a.topo', stubs: 'net-a.stubs' },
      { name: 'net-b.topo', stubs: '' },
    ],
    destinations: [1, 2],
    repetitions: 100,
    minDelay: 10,
    maxDelay: 1000,
    threshold: 2_000_000,
    reportNodes: true,
  };

  test('builds the topology × destination product', () => {
    const simulations = generateSimulations({ ...base, newId: counterIds() });
    assert.deepStrictEqual(
      simulations.map((s) => [s.id, s.topology, s.destination, s.stubsFile]),
      [
        ['sim-1', 'net-a.topo', 1, 'net-a.stubs'],
        ['sim-2', 'net-a.topo', 2, 'net-a.stubs'],
        ['sim-3', 'net-b.topo', 1, ''],
        ['sim-4', 'net-b.topo', 2, ''],
      ]
    );
  });

  test('copies run parameters and leaves the seed unset', () => {
    const [first] = generateSimulations({ ...base, newId: counterIds() });
    assert.deepStrictEqual(first, {
      id: 'sim-1',
      topology: 'net-a.topo',
      destination: 1,
      repetitions: 100,
      minDelay: 10,
      maxDelay: 1000,
      threshold: 2_000_000,
      stubsFile: 'net-a.stubs',
      seed: null,
      reportNodes: true,
    });
  });

  test('assigns distinct uuids by default', () => {
    const ids = generateSimulations(base).map((s) => s.id);
    assert.strictEqual(new Set(ids).size, 4);
    for (const id of ids) assert.match(id, /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  test('rejects a min delay above the max delay', () => {
    assert.throws(
      () => generateSimulations({ ...base, minDelay: 50, maxDelay: 5 }),
      /minDelay must not exceed maxDelay/
    );
  });

  test('rejects zero repetitions', () => {
    assert.throws(() => generateSimulations({ ...base, repetitions: 0 }), /repetitions/);
  });

  test('no destinations produce no simulations', () => {
    assert.deepStrictEqual(generateSimulations({ ...base, destinations: [] }), []);
  });
});

describe('reading from disk', () => {
  let dir: string;

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'generator-test-'));
    fs.writeFileSync(path.join(dir, 'topologies.txt'), 'net-a.topo|net-a.stubs\nnet-missing.topo|x.stubs\n');
    fs.writeFileSync(path.join(dir, 'destinations.txt'), '5\n6\n');
    fs.writeFileSync(path.join(dir, 'net-a.topo'), 'placeholder topology\n');
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('readTopologies and readDestinations parse the files', async () => {
    assert.deepStrictEqual(await readTopologies(path.join(dir, 'topologies.txt')), [
      { name: 'net-a.topo', stubs: 'net-a.stubs' },
      { name: 'net-missing.topo', stubs: 'x.stubs' },
    ]);
    assert.deepStrictEqual(await readDestinations(path.join(dir, 'destinations.txt')), [5, 6]);
  });

  test('findMissingTopologies lists topologies absent from disk', async () => {
    const topologies = await readTopologies(path.join(dir, 'topologies.txt'));
    assert.deepStrictEqual(await findMissingTopologies(topologies, dir), ['net-missing.topo']);
  });
});
