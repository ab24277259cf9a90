import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ModelLoadError, ValidationError } from '../shared/errors.js';
import { loadModelFromFile, loadModelsFromDirectory } from './model-loader.js';

const SALES_YAML = `
name: Sales
version: "1.2"
entities:
  - name: Customer
    properties:
      - name: Id
        data_type: Integer
        required: true
business_rules:
  - name: HighValueOrder
    condition: Amount > 10000
    action: Flag
`;

const FINANCE_JSON = JSON.stringify({
  name: 'Finance',
  entities: [{ name: 'Customer', properties: [{ name: 'Id', data_type: 'String' }] }],
});

describe('ModelLoader', () => {
  let rootDir: string;

  beforeEach(() => {
    rootDir = mkdtempSync(path.join(os.tmpdir(), 'semdiff-models-'));
  });

  afterEach(() => {
    rmSync(rootDir, { recursive: true, force: true });
  });

  const write = (name: string, content: string): string => {
    const filePath = path.join(rootDir, name);
    writeFileSync(filePath, content, 'utf-8');
    return filePath;
  };

  describe('loadModelFromFile', () => {
    it('should load a YAML model', () => {
      const model = loadModelFromFile(write('sales.yaml', SALES_YAML));

      expect(model.name).toBe('Sales');
      expect(model.version).toBe('1.2');
      expect(model.entities[0]?.properties[0]).toMatchObject({ name: 'Id', data_type: 'Integer', required: true });
      expect(model.business_rules[0]?.condition).toBe('Amount > 10000');
    });

    it('should load a JSON model', () => {
      const model = loadModelFromFile(write('finance.json', FINANCE_JSON));
      expect(model.name).toBe('Finance');
      expect(model.version).toBe('1.0');
    });

    it('should accept the .yml extension', () => {
      expect(loadModelFromFile(write('sales.yml', SALES_YAML)).name).toBe('Sales');
    });

    it('should reject unsupported extensions', () => {
      const filePath = write('sales.txt', SALES_YAML);
      expect(() => loadModelFromFile(filePath)).toThrow(ModelLoadError);
      expect(() => loadModelFromFile(filePath)).toThrow(
        `Failed to load model from ${filePath}: unsupported model file format: .txt (expected .json, .yaml, or .yml)`,
      );
    });

    it('should wrap syntax errors', () => {
      const filePath = write('broken.json', '{ "name": ');
      expect(() => loadModelFromFile(filePath)).toThrow(ModelLoadError);
    });

    it('should wrap a missing file', () => {
      expect(() => loadModelFromFile(path.join(rootDir, 'missing.yaml'))).toThrow(
        /Failed to load model from .*missing\.yaml: file could not be read/,
      );
    });

    it('should surface shape problems as validation errors', () => {
      const filePath = write('nameless.json', JSON.stringify({ version: '1.0' }));
      expect(() => loadModelFromFile(filePath)).toThrow(ValidationError);
    });

    it('should pass parse options through', () => {
      const filePath = write(
        'dupes.json',
        JSON.stringify({ name: 'Dupes', business_rules: [{ name: 'R' }, { name: 'R' }] }),
      );
      expect(() => loadModelFromFile(filePath, { rejectDuplicates: true })).toThrow(
        'Duplicate business rule name "R"',
      );
    });
  });

  describe('loadModelsFromDirectory', () => {
    it('should load every model file keyed by file name in sorted order', () => {
      write('sales.yaml', SALES_YAML);
      write('finance.json', FINANCE_JSON);
      write('README.md', '# not a model');

      const models = loadModelsFromDirectory(rootDir);

      expect(Object.keys(models)).toEqual(['finance.json', 'sales.yaml']);
      expect(models['sales.yaml']?.name).toBe('Sales');
    });

    it('should return an empty collection for a directory without models', () => {
      expect(loadModelsFromDirectory(rootDir)).toEqual({});
    });
  });
});
