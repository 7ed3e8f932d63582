import { createStaticSchemaMetadata } from '../../src/schema/static-metadata.js';

export const schemaMetadata = createStaticSchemaMetadata({
  Customer: [
    { name: 'id', type: 'Int', isId: true, isRequired: true },
    { name: 'name', type: 'String', isRequired: true },
    { name: 'email', type: 'String' },
    { name: 'ownerId', type: 'String' },
    { name: 'status', type: 'CustomerStatus', kind: 'enum' },
    { name: 'tags', type: 'String', isList: true },
    { name: 'balance', type: 'Decimal' },
    { name: 'createdAt', type: 'DateTime' },
    { name: 'orders', type: 'Order', kind: 'object', isList: true },
  ],
  Order: [
    { name: 'code', type: 'String', isId: true },
    { name: 'total', type: 'Float' },
    { name: 'customerId', type: 'Int' },
    { name: 'customer', type: 'Customer', kind: 'object' },
  ],
  Setting: [
    { name: 'key', type: 'String' },
    { name: 'value', type: 'Json' },
  ],
});
