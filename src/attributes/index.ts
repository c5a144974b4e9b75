/**
 * Attributes - barrel exports.
 */

export {
  AttributeSet,
  AttributeDefinitionSchema,
  AttributeValueSchema,
  defaultValue,
  valueSchema,
} from './attribute-set.js';

export type {
  AttributeType,
  AttributeValue,
  AttributeDefinition,
  AttributeChange,
  AttributeChangeKind,
  AttributeListener,
} from './attribute-set.js';

export {
  AttributesSchema,
  AttributesSchemaFileSchema,
  ProcessAttributes,
  defineProcessAttributes,
  parseAttributesSchema,
} from './schema.js';

export type { ProcessAttributesClass } from './schema.js';

export { AttributesFactory } from './factory.js';
export type { FactoryCategories, FactoryCategory } from './factory.js';
