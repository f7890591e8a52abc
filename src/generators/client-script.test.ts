import * as vm from 'node:vm';
import { describe, it, expect } from 'vitest';
import { THEME_STORAGE_KEY, generateClientScript, generateFilterEngineScript } from './client-script';
import { toCurl } from './curl-generator';
import { escapeHtml } from '../utils/sanitizers';
import type { StatusCodeClass, TestCaseRecord } from '../types';

interface FilterState {
  activeStatusFilter: 'all' | StatusCodeClass;
  searchText: string;
  maxDurationFilter: number;
}

interface FilterEngine {
  isRecordVisible(record: TestCaseRecord, state: FilterState): boolean;
  buildCurl(record: TestCaseRecord): string | null;
  filterGroups(groups: Array<{ endpoint: string; records: TestCaseRecord[] }>, state: FilterState): Array<{ endpoint: string; records: TestCaseRecord[] }>;
  escapeHtml(value: string): string;
  pillClass(code: number | undefined): string;
}

function loadEngine(): FilterEngine {
  return vm.runInNewContext(
    `${generateFilterEngineScript()}\n;({ isRecordVisible, buildCurl, filterGroups, escapeHtml, pillClass })`,
  );
}

function createRecord(overrides: Partial<TestCaseRecord> = {}): TestCaseRecord {
  return {
    suiteName: 'schemathesis',
    testName: 'GET /api/items',
    endpoint: 'GET /api/items',
    status: 'failure',
    statusCode: 500,
    statusCodeClass: '5xx',
    durationSeconds: 1,
    message: '[500] Internal Server Error',
    fullText: '[500] Internal Server Error',
    request: { headers: [] },
    ...overrides,
  };
}

function createState(overrides: Partial<FilterState> = {}): FilterState {
  return { activeStatusFilter: 'all', searchText: '', maxDurationFilter: 10, ...overrides };
}

describe('filter engine', () => {
  const engine = loadEngine();

  describe('isRecordVisible', () => {
    it('shows everything with the default state', () => {
      expect(engine.isRecordVisible(createRecord(), createState())).toBe(true);
    });

    it('filters by status class', () => {
      const record = createRecord({ statusCode: 404, statusCodeClass: '4xx' });

      expect(engine.isRecordVisible(record, createState({ activeStatusFilter: '5xx' }))).toBe(false);
      expect(engine.isRecordVisible(record, createState({ activeStatusFilter: '4xx' }))).toBe(true);
    });

    it('searches endpoint and suite name case-insensitively', () => {
      const record = createRecord({ endpoint: 'POST /api/Orders', suiteName: 'Checkout' });

      expect(engine.isRecordVisible(record, createState({ searchText: 'orders' }))).toBe(true);
      expect(engine.isRecordVisible(record, createState({ searchText: 'CHECKOUT' }))).toBe(true);
      expect(engine.isRecordVisible(record, createState({ searchText: 'users' }))).toBe(false);
    });

    it('hides records slower than the duration limit', () => {
      const record = createRecord({ durationSeconds: 2.5 });

      expect(engine.isRecordVisible(record, createState({ maxDurationFilter: 2.5 }))).toBe(true);
      expect(engine.isRecordVisible(record, createState({ maxDurationFilter: 2 }))).toBe(false);
    });
  });

  describe('filterGroups', () => {
    it('drops groups left without visible records', () => {
      const groups = [
        { endpoint: 'GET /a', records: [createRecord({ endpoint: 'GET /a' })] },
        { endpoint: 'GET /b', records: [createRecord({ endpoint: 'GET /b', statusCodeClass: '4xx' })] },
      ];

      const visible = engine.filterGroups(groups, createState({ activeStatusFilter: '4xx' }));

      expect(Array.from(visible, g => g.endpoint)).toEqual(['GET /b']);
      expect(visible[0].records).toHaveLength(1);
    });
  });

  describe('buildCurl', () => {
    it('matches the server-side curl command', () => {
      const record = createRecord({
        request: {
          method: 'POST',
          url: 'https://api.example.com/items',
          headers: [['Content-Type', 'application/json'], ['X-Note', "it's"]],
          body: "{'a':1}",
        },
      });

      expect(engine.buildCurl(record)).toBe(toCurl(record));
      expect(engine.buildCurl(record)).toBe(
        "curl -X POST 'https://api.example.com/items' -H 'Content-Type: application/json' -H 'X-Note: it'\\''s' -d '{'\\''a'\\'':1}'",
      );
    });

    it('keeps header order after a JSON round trip', () => {
      const record = createRecord({
        request: { method: 'GET', url: 'http://h/x', headers: [['X-B', '1'], ['2', 'two'], ['__proto__', 'p']] },
      });
      const embedded: TestCaseRecord = JSON.parse(JSON.stringify(record));

      expect(engine.buildCurl(embedded)).toBe("curl -X GET 'http://h/x' -H 'X-B: 1' -H '2: two' -H '__proto__: p'");
    });

    it('returns null without a url', () => {
      expect(engine.buildCurl(createRecord())).toBeNull();
    });
  });

  describe('escapeHtml', () => {
    it('matches the server-side escaping', () => {
      const text = `<a href="x">'&'</a>`;

      expect(engine.escapeHtml(text)).toBe(escapeHtml(text));
    });
  });

  describe('pillClass', () => {
    it('maps status codes to pill styles', () => {
      expect(engine.pillClass(502)).toBe('pill-5xx');
      expect(engine.pillClass(418)).toBe('pill-4xx');
      expect(engine.pillClass(204)).toBe('pill-2xx');
      expect(engine.pillClass(301)).toBe('pill-unk');
      expect(engine.pillClass(undefined)).toBe('pill-unk');
    });
  });
});

describe('generateClientScript', () => {
  it('compiles as a script', () => {
    expect(() => new vm.Script(generateClientScript())).not.toThrow();
  });

  it('persists the theme under a fixed storage key', () => {
    expect(generateClientScript()).toContain(`localStorage.setItem('${THEME_STORAGE_KEY}', theme)`);
  });
});
