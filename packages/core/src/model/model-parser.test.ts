import { describe, it, expect } from 'vitest';
import { ValidationError } from '../shared/errors.js';
import { parseModel, serializeModel } from './model-parser.js';

function validationErrorOf(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('parseModel', () => {
  it('should fill defaults for omitted fields', () => {
    const model = parseModel({
      name: 'Sales',
      entities: [{ name: 'Customer', properties: [{ name: 'Id' }] }],
      relationships: [{ from_entity: 'Order', to_entity: 'Customer' }],
      business_rules: [{ name: 'HighValueOrder' }],
    });

    expect(model).toEqual({
      name: 'Sales',
      version: '1.0',
      source: '',
      entities: [
        {
          name: 'Customer',
          description: '',
          entity_type: 'standard',
          constraints: [],
          properties: [
            {
              name: 'Id',
              data_type: 'String',
              required: false,
              unique: false,
              description: '',
              constraints: [],
            },
          ],
        },
      ],
      relationships: [
        {
          from_entity: 'Order',
          to_entity: 'Customer',
          from_property: '',
          to_property: '',
          relationship_type: 'related_to',
          cardinality: 'one-to-many',
          description: '',
        },
      ],
      business_rules: [
        {
          name: 'HighValueOrder',
          entity: '',
          condition: '',
          action: '',
          classification: '',
          description: '',
          priority: 1,
        },
      ],
      metadata: {},
    });
  });

  it('should keep provenance fields when present', () => {
    const model = parseModel({
      name: 'Sales',
      entities: [{ name: 'Customer', source_table: 'dim_customer', properties: [{ name: 'Id', source_column: 'cust_id' }] }],
      business_rules: [{ name: 'Total', source_measure: 'Total Sales' }],
    });

    expect(model.entities[0]?.source_table).toBe('dim_customer');
    expect(model.entities[0]?.properties[0]?.source_column).toBe('cust_id');
    expect(model.business_rules[0]?.source_measure).toBe('Total Sales');
  });

  it('should reject a model without a name', () => {
    const error = validationErrorOf(() => parseModel({ version: '1.0' }));
    expect(error.field).toBe('/name');
    expect(error.message).toBe("Invalid model: /name must have required property 'name'");
  });

  it('should point at the nested record that is missing a name', () => {
    const error = validationErrorOf(() => parseModel({ name: 'Sales', entities: [{ name: 'A' }, { description: 'x' }] }));
    expect(error.field).toBe('/entities/1/name');
  });

  it('should reject fields of the wrong type', () => {
    const error = validationErrorOf(() => parseModel({ name: 'Sales', version: 2 }));
    expect(error.field).toBe('/version');
    expect(error.message).toBe('Invalid model: /version must be string');
  });

  it('should reject input that is not an object', () => {
    const error = validationErrorOf(() => parseModel('Sales'));
    expect(error.field).toBe('/');
  });

  it('should reject a non-integer rule priority', () => {
    expect(() => parseModel({ name: 'Sales', business_rules: [{ name: 'R', priority: 1.5 }] })).toThrow(
      ValidationError,
    );
  });

  describe('duplicate names', () => {
    const doc = {
      name: 'Sales',
      entities: [
        { name: 'Customer', description: 'first' },
        { name: 'Customer', description: 'second' },
      ],
    };

    it('should keep every record by default', () => {
      expect(parseModel(doc).entities.map((e) => e.description)).toEqual(['first', 'second']);
    });

    it('should reject them when asked to', () => {
      const error = validationErrorOf(() => parseModel(doc, { rejectDuplicates: true }));
      expect(error.message).toBe('Duplicate entity name "Customer"');
      expect(error.field).toBe('/entities');
      expect(error.details).toEqual({ scope: 'entity', key: 'Customer' });
    });

    it('should reject repeated relationship endpoints when asked to', () => {
      const relationships = [
        { from_entity: 'Order', to_entity: 'Customer' },
        { from_entity: 'Order', to_entity: 'Customer', cardinality: 'one-to-one' },
      ];
      const error = validationErrorOf(() =>
        parseModel({ name: 'Sales', relationships }, { rejectDuplicates: true }),
      );
      expect(error.message).toBe('Duplicate relationship name "Order→Customer"');
    });
  });
});

describe('serializeModel', () => {
  it('should produce a document that parses back to the same model', () => {
    const model = parseModel({
      name: 'Sales',
      version: '2.1',
      source: 'sales.yaml',
      entities: [
        {
          name: 'Customer',
          entity_type: 'dimension',
          source_table: 'dim_customer',
          properties: [
            {
              name: 'Email',
              required: true,
              constraints: [{ type: 'pattern', value: '.+@.+', message: 'must be an email' }],
            },
          ],
        },
      ],
      relationships: [{ from_entity: 'Order', to_entity: 'Customer', cardinality: 'many-to-one' }],
      business_rules: [{ name: 'R', condition: 'x > 1', priority: 3 }],
      metadata: { owner: 'sales', tags: ['crm'], certified: true },
    });

    expect(parseModel(serializeModel(model))).toEqual(model);
  });
});
