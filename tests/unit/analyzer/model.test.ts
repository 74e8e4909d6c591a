import { describe, it, expect } from 'vitest';
import { analyze } from '../../../src/analyzer/index.js';
import { PythonSyntaxError } from '../../../src/parser/errors.js';
import type { PyNode } from '../../../src/parser/nodes.js';
import { SAMPLE_SITE } from '../../helpers/fixtures.js';

describe('AnalysisModel', () => {
  it('should expose records and routes of a site', () => {
    const model = analyze(SAMPLE_SITE);

    expect(model.getRecordNames()).toEqual(['Item', 'State']);
    expect(model.getRoutes().map(r => r.signature)).toEqual(['index(state)', 'details(state)']);
  });

  it('should build composition and call edges', () => {
    const model = analyze(SAMPLE_SITE);

    expect(model.getCompositionEdges()).toEqual([{ from: 'State', to: 'Item' }]);
    expect(model.getCallEdges()).toEqual([
      { from: 'index', to: 'Page' },
      { from: 'index', to: 'details' },
      { from: 'details', to: 'Page' },
      { from: 'details', to: 'index' },
    ]);
  });

  it('should return copies from queries', () => {
    const model = analyze(SAMPLE_SITE);

    model.getRecords()[0]?.fields.push({ name: 'extra', type: 'int' });
    model.getRoute('index')?.calledNames.push('elsewhere');
    model.getComponentUsage().set('Text', 99);
    model.getCallGraph().get('index')?.push('elsewhere');
    const section = model.getSectionComplexity()[0];
    if (section) section.counts.basic++;

    expect(model.getRecord('Item')?.fields).toEqual([{ name: 'name', type: 'str' }]);
    expect(model.getRoute('index')?.calledNames).toEqual(['Page', 'details']);
    expect(model.getComponentUsage().get('Text')).toBe(1);
    expect(model.getCallGraph().get('index')).toEqual(['Page', 'details']);
    expect(model.getSectionComplexity()[0]?.counts.basic).toBe(2);
  });

  it('should render annotation nodes', () => {
    const model = analyze('@dataclass\nclass Holder:\n    lookup: dict[str, Item]\n');

    expect(model.getRecord('Holder')?.fields[0]?.type).toBe('dict[str, Item]');
  });

  it('should add records with copied fields', () => {
    const model = analyze(SAMPLE_SITE);
    const fields = new Map<string, PyNode>();

    model.addRecord('Extra', fields, ['Base']);
    fields.clear();

    expect(model.getRecord('Extra')).toEqual({
      name: 'Extra',
      fields: [],
      baseTypes: ['Base'],
      dependencies: [],
      location: { startLine: 0, endLine: 0 },
    });
  });

  it('should return an empty model for a file without records or routes', () => {
    const model = analyze('print("hello")\n');

    expect(model.getRecords()).toEqual([]);
    expect(model.getRoutes()).toEqual([]);
    expect(model.getTotalComplexity()).toBe(0);
    expect(model.getUnusedRecords()).toEqual([]);
    expect(model.getUnusedFields()).toEqual([]);
  });

  it('should give identical results for identical source', () => {
    const first = analyze(SAMPLE_SITE);
    const second = analyze(SAMPLE_SITE);

    expect(second.getRecords()).toEqual(first.getRecords());
    expect(second.getRoutes()).toEqual(first.getRoutes());
    expect(second.getCompositionEdges()).toEqual(first.getCompositionEdges());
  });

  it('should propagate syntax errors', () => {
    expect(() => analyze('def broken(:\n')).toThrow(PythonSyntaxError);
  });
});
