import { AutoIncrement, Column, Default, Entity, Nullable, Unique } from '../../src/orm/index.js';

@Entity('users')
export class User {
  @AutoIncrement()
  @Column('integer')
  id: number | null = null;

  @Column('string')
  name = '';

  @Unique()
  @Column('string')
  email = '';

  @Nullable()
  @Column('integer')
  age: number | null = null;

  @Nullable()
  @Column('float')
  score: number | null = null;

  @Default('1')
  @Column('boolean')
  isActive = true;
}

export function makeUser(fields: Partial<User> & Pick<User, 'name' | 'email'>): User {
  return Object.assign(new User(), fields);
}

export const SAMPLE_USERS: readonly Pick<User, 'name' | 'email' | 'age'>[] = [
  { name: 'Ann', email: 'ann@example.com', age: 30 },
  { name: 'Bob', email: 'bob@example.com', age: 25 },
  { name: 'Carla', email: 'carla@example.com', age: 41 },
  { name: 'Dan', email: 'dan@example.com', age: null },
  { name: 'Eve', email: 'eve@example.com', age: 35 },
];
