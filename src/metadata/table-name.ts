const IDENTIFIER = String.raw`((?:[\w$]+|"[^"]+"|\x60[^\x60]+\x60|\[[^\]]+\])(?:\.(?:[\w$]+|"[^"]+"|\x60[^\x60]+\x60|\[[^\]]+\]))?)`;

// Statement shapes used to find the target table of a raw SQL string
const SQL_TABLE_PATTERNS: RegExp[] = [
  new RegExp(String.raw`^\s*INSERT\s+(?:IGNORE\s+)?INTO\s+${IDENTIFIER}`, 'i'),
  new RegExp(String.raw`^\s*REPLACE\s+INTO\s+${IDENTIFIER}`, 'i'),
  new RegExp(String.raw`^\s*UPDATE\s+${IDENTIFIER}`, 'i'),
  new RegExp(String.raw`^\s*DELETE\s+FROM\s+${IDENTIFIER}`, 'i'),
  new RegExp(String.raw`^\s*MERGE\s+INTO\s+${IDENTIFIER}`, 'i'),
  new RegExp(String.raw`^\s*(?:CREATE|ALTER|DROP|TRUNCATE)\s+TABLE\s+(?:IF\s+(?:NOT\s+)?EXISTS\s+)?${IDENTIFIER}`, 'i'),
  new RegExp(String.raw`^\s*(?:WITH\b[\s\S]*?\)\s*)?SELECT\b[\s\S]*?\bFROM\s+${IDENTIFIER}`, 'i'),
];

function unquote(part: string): string {
  return part.replace(/^["`[]|["`\]]$/g, '');
}

/**
 * Table reference with optional schema and alias
 */
export class TableName {
  readonly ignoreInterceptors: ReadonlySet<string>;

  constructor(
    readonly name: string,
    readonly schema?: string,
    readonly alias?: string,
    ignoreInterceptors: Iterable<string> = [],
  ) {
    this.ignoreInterceptors = new Set(ignoreInterceptors);
  }

  /**
   * Parse `schema.table`, `table AS alias` or `table alias`
   */
  static parse(text: string): TableName {
    const [reference, ...rest] = text.trim().split(/\s+/);
    const aliasParts = rest[0]?.toUpperCase() === 'AS' ? rest.slice(1) : rest;
    const dot = reference.indexOf('.');
    const schema = dot > 0 ? unquote(reference.slice(0, dot)) : undefined;
    const name = unquote(dot > 0 ? reference.slice(dot + 1) : reference);
    return new TableName(name, schema, aliasParts[0] ? unquote(aliasParts[0]) : undefined);
  }

  /**
   * Sniff the target table of a statement; undefined when the shape is not recognised
   */
  static fromSql(sql: string): TableName | undefined {
    for (const pattern of SQL_TABLE_PATTERNS) {
      const match = pattern.exec(sql);
      if (match) {
        return TableName.parse(match[1]);
      }
    }
    return undefined;
  }

  get completeName(): string {
    return this.schema ? `${this.schema}.${this.name}` : this.name;
  }

  withAlias(alias: string | undefined): TableName {
    return new TableName(this.name, this.schema, alias, this.ignoreInterceptors);
  }

  withIgnoreInterceptors(...names: string[]): TableName {
    return new TableName(this.name, this.schema, this.alias, [...this.ignoreInterceptors, ...names]);
  }

  ignores(interceptor: string): boolean {
    return this.ignoreInterceptors.has(interceptor);
  }

  toString(): string {
    return this.alias ? `${this.completeName} ${this.alias}` : this.completeName;
  }
}
