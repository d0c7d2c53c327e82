import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { z } from 'zod';
import { registerTools } from '../src/tools.js';
import * as registry from '../src/registry.js';
import { loadSettings } from '../src/settings.js';

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1),
  isError: z.boolean().optional(),
});

const reportSchema = z.object({
  type: z.literal('speeds_feeds'),
  units: z.enum(['metric', 'imperial']),
  report: z.object({
    rpm: z.number(),
    feed: z.number(),
    effective_mmpt: z.number(),
    sfm: z.number(),
    rpm_status: z.string(),
    rpm_message: z.string(),
    warnings: z.array(z.string()),
    material_name: z.string().nullable(),
    coating_name: z.string().nullable(),
    rigidity_name: z.string().nullable(),
  }),
});

let client: Client;
let dir: string;
let settingsFile: string;

async function call(name: string, args: Record<string, unknown> = {}) {
  const raw = await client.callTool({ name, arguments: args });
  const result = toolResultSchema.parse(raw);
  return { isError: result.isError === true, text: result.content[0].text };
}

async function callJson<T extends z.ZodTypeAny>(name: string, args: Record<string, unknown>, schema: T): Promise<z.infer<T>> {
  const { isError, text } = await call(name, args);
  expect(isError, text).toBe(false);
  return schema.parse(JSON.parse(text));
}

beforeEach(async () => {
  registry.clear();
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'feedspeed-tools-'));
  settingsFile = path.join(dir, 'settings.json');

  const server = new McpServer({ name: 'feedspeed-test', version: '0.0.0' });
  registerTools(server, { settingsPath: settingsFile });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: 'test-client', version: '0.0.0' });
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
});

afterEach(async () => {
  await client.close();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('reference tables', () => {
  it('lists materials', async () => {
    const data = await callJson('list_materials', {}, z.object({
      count: z.number(),
      materials: z.array(z.object({ key: z.string(), name: z.string() })),
    }));
    expect(data.count).toBe(13);
    expect(data.materials[0]).toEqual({ key: 'aluminum_6061', name: 'Aluminum 6061-T6' });
  });

  it('lists rigidity levels in order', async () => {
    const data = await callJson('list_rigidity_levels', {}, z.object({
      levels: z.array(z.object({ key: z.string(), factor: z.number() })),
    }));
    expect(data.levels).toEqual([
      { key: 'hobby', factor: 0.4 },
      { key: 'light', factor: 0.6 },
      { key: 'medium', factor: 0.8 },
      { key: 'heavy', factor: 1 },
    ]);
  });
});

describe('calculate_speeds_feeds', () => {
  it('fills cutting values from the material and warns about thin chips', async () => {
    const data = await callJson('calculate_speeds_feeds', {
      diameter: 10, flute_num: 3, material: 'aluminum_6061', doc: 5, woc: 2,
    }, reportSchema);
    expect(data.units).toBe('metric');
    expect(data.report.rpm).toBeCloseTo(9708.45, 1);
    expect(data.report.rpm_status).toBe('info');
    expect(data.report.rpm_message).toBe('within safe range');
    expect(data.report.material_name).toBe('Aluminum 6061-T6');
    expect(data.report.rigidity_name).toBe('Medium (Small VMC)');
    expect(data.report.warnings).toEqual([
      'Reduced radial engagement (20% of diameter) produces thin chips: actual chip load is 80% of feed per tooth. Enable HSM to compensate feed.',
    ]);
  });

  it('uses a defined cutter with its coating and stickout', async () => {
    await callJson('define_cutter', {
      name: 'em10', diameter: 10, flute_num: 3, tool_stickout: 30, coating: 'tialn',
    }, z.object({ cutter_id: z.literal('em10') }));

    const data = await callJson('calculate_speeds_feeds', {
      cutter: 'em10', material: 'aluminum_6061', doc: 5, woc: 2, hsm: true,
    }, reportSchema);
    // 305 m/min × 1.4 for TiAlN
    expect(data.report.rpm).toBeCloseTo(13591.83, 1);
    expect(data.report.effective_mmpt).toBeCloseTo(0.1, 9);
    expect(data.report.coating_name).toBe('TiAlN');
    expect(data.report.warnings).toEqual([]);
  });

  it('converts imperial inputs', async () => {
    const data = await callJson('calculate_speeds_feeds', {
      units: 'imperial', diameter: 0.5, flute_num: 2, material: 'aluminum_6061', doc: 0.25, woc: 0.25,
    }, reportSchema);
    expect(data.units).toBe('imperial');
    expect(data.report.rpm).toBeCloseTo(7639.44, 1);
    expect(data.report.sfm).toBeCloseTo(1000, 6);
    expect(data.report.warnings).toEqual([]);
  });

  it('reports an unknown cutter', async () => {
    const result = await call('calculate_speeds_feeds', { cutter: 'nope', doc: 1, woc: 1 });
    expect(result).toEqual({ isError: true, text: 'Cutter "nope" not found. Available cutters: []' });
  });

  it('names the missing cutting values', async () => {
    const result = await call('calculate_speeds_feeds', {
      diameter: 10, flute_num: 2, material: 'unobtainium', doc: 1, woc: 1,
    });
    expect(result.isError).toBe(true);
    expect(result.text).toMatch(/^Missing surface_speed, feed_per_tooth, kc\. /);
  });

  it('rejects an unknown rigidity level before calculating', async () => {
    const result = await call('calculate_speeds_feeds', {
      diameter: 10, flute_num: 3, material: 'aluminum_6061', doc: 5, woc: 2, rigidity_level: 'wobbly',
    });
    expect(result).toEqual({
      isError: true,
      text: 'Unknown rigidity level "wobbly". Available: [hobby, light, medium, heavy]',
    });
  });

  it('rejects an unknown coating before calculating', async () => {
    const result = await call('calculate_speeds_feeds', {
      diameter: 10, flute_num: 3, material: 'aluminum_6061', doc: 5, woc: 2, coating: 'nope',
    });
    expect(result).toEqual({
      isError: true,
      text: 'Unknown coating "nope". Available: [uncoated, tin, ticn, tialn, altin, zrn, dlc]',
    });
  });

  it('rejects a width of cut wider than the tool', async () => {
    const result = await call('calculate_speeds_feeds', {
      diameter: 10, flute_num: 2, doc: 1, woc: 12, surface_speed: 300, feed_per_tooth: 0.05, kc: 700,
    });
    expect(result).toEqual({ isError: true, text: 'Width of cut 12 mm exceeds tool diameter 10 mm' });
  });
});

describe('validate_parameters', () => {
  it('flags an implausible feed', async () => {
    const data = await callJson('validate_parameters', {
      rpm: 9549, feed: 12000, doc: 5, woc: 5, diameter: 10,
    }, z.object({ warnings: z.array(z.string()) }));
    expect(data.warnings).toEqual([
      'Feed rate 12,000 mm/min is implausibly high for a 10 mm tool (limit 10,000 mm/min)',
    ]);
  });
});

describe('classify_rpm', () => {
  const statusSchema = z.object({ status: z.string(), message: z.string(), display: z.string() });

  it('defaults to the machine limits', async () => {
    const data = await callJson('classify_rpm', { rpm: 500 }, statusSchema);
    expect(data).toEqual({ status: 'danger', message: 'below minimum', display: 'below minimum (1,000 RPM)' });
  });

  it('accepts explicit limits', async () => {
    const data = await callJson('classify_rpm', {
      rpm: 19500, min_rpm: 1000, preferred_rpm: 10000, max_rpm: 20000,
    }, statusSchema);
    expect(data).toEqual({ status: 'warning', message: 'approaching maximum', display: 'approaching maximum' });
  });
});

describe('configure_machine', () => {
  it('merges changes and saves them', async () => {
    const data = await callJson('configure_machine', { rigidity_level: 'heavy', max_rpm: 30000 }, z.object({
      machine: z.object({ rigidity_level: z.string(), rigidity_name: z.string(), min_rpm: z.number(), max_rpm: z.number() }),
      saved_to: z.string(),
    }));
    expect(data.machine).toEqual({
      rigidity_level: 'heavy', rigidity_name: 'Heavy (Production VMC)', min_rpm: 1000, max_rpm: 30000,
    });
    expect(data.saved_to).toBe(settingsFile);
    expect(loadSettings(settingsFile).machine.rigidity_level).toBe('heavy');
    expect(registry.getMachineSetup().max_rpm).toBe(30000);
  });

  it('clears the spindle power with null', async () => {
    await callJson('configure_machine', { spindle_power_kw: 3 }, z.object({ type: z.literal('machine') }));
    expect(registry.getMachineSetup().spindle_power_kw).toBe(3);

    const machineSchema = z.object({ machine: z.object({ spindle_power_kw: z.number().optional() }) });
    const data = await callJson('configure_machine', { spindle_power_kw: null }, machineSchema);
    expect(data.machine.spindle_power_kw).toBeUndefined();
    expect(registry.getMachineSetup().spindle_power_kw).toBeUndefined();
    expect(loadSettings(settingsFile).machine.spindle_power_kw).toBeUndefined();
  });

  it('rejects an unknown rigidity level', async () => {
    const result = await call('configure_machine', { rigidity_level: 'wobbly' });
    expect(result).toEqual({
      isError: true,
      text: 'Unknown rigidity level "wobbly". Available: [hobby, light, medium, heavy]',
    });
    expect(fs.existsSync(settingsFile)).toBe(false);
  });
});
