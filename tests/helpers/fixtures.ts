import { ProductRecord, UserRecord } from '../../src/types/integration';

export const buildUser = (overrides: Partial<UserRecord> = {}): UserRecord => ({
    id: 1,
    name: 'John',
    email: 'john@gmail.com',
    city: 'Springfield',
    ...overrides
});

export const buildProduct = (overrides: Partial<ProductRecord> = {}): ProductRecord => ({
    id: 1,
    title: 'Canvas Backpack',
    price: 20,
    category: "men's clothing",
    ...overrides
});
