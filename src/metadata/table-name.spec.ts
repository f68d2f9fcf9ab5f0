import { TableName } from './table-name';

describe('TableName', () => {
  it('should parse schema and alias', () => {
    const table = TableName.parse('app.users AS u');
    expect(table.name).toBe('users');
    expect(table.schema).toBe('app');
    expect(table.alias).toBe('u');
    expect(table.completeName).toBe('app.users');
    expect(table.toString()).toBe('app.users u');
  });

  it('should strip quotes', () => {
    const table = TableName.parse('"Orders" o');
    expect(table.name).toBe('Orders');
    expect(table.alias).toBe('o');
  });

  it.each([
    ['INSERT INTO `shop`.`items` (a) VALUES (?)', 'items'],
    ['update users set a = ?', 'users'],
    ['DELETE FROM logs WHERE id = ?', 'logs'],
    ['select * from users where id = ?', 'users'],
    ['DROP TABLE IF EXISTS archive', 'archive'],
  ])('should sniff the table of %s', (sql, name) => {
    expect(TableName.fromSql(sql)?.name).toBe(name);
  });

  it('should return undefined for statements without a table', () => {
    expect(TableName.fromSql('VACUUM')).toBeUndefined();
  });

  it('should accumulate ignored interceptors', () => {
    const table = new TableName('users').withIgnoreInterceptors('logging');
    expect(table.ignores('logging')).toBe(true);
    expect(table.ignores('audit')).toBe(false);
  });
});
