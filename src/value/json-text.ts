import { DataError } from '../common/errors';
import { Value } from './value';

const NUMBER_TOKEN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

/**
 * Walks JSON text that JSON.parse has already accepted, keeping object keys in document order
 */
class JsonTextReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  read(): Value {
    const value = this.value();
    this.skipWhitespace();
    return value;
  }

  private value(): Value {
    this.skipWhitespace();
    switch (this.text[this.pos]) {
      case '{':
        return this.object();
      case '[':
        return this.array();
      case '"':
        return Value.text(this.string());
      case 't':
        return this.literal('true', Value.bool(true));
      case 'f':
        return this.literal('false', Value.bool(false));
      case 'n':
        return this.literal('null', Value.null());
      default:
        return this.number();
    }
  }

  private object(): Value {
    const entries = new Map<string, Value>();
    this.pos++;
    this.skipWhitespace();
    if (this.text[this.pos] === '}') {
      this.pos++;
      return Value.object(entries);
    }
    for (;;) {
      this.skipWhitespace();
      const key = this.string();
      this.skipWhitespace();
      this.expect(':');
      // a repeated key keeps its first position and its last value
      entries.set(key, this.value());
      this.skipWhitespace();
      if (this.text[this.pos] === ',') {
        this.pos++;
        continue;
      }
      this.expect('}');
      return Value.object(entries);
    }
  }

  private array(): Value {
    const values: Value[] = [];
    this.pos++;
    this.skipWhitespace();
    if (this.text[this.pos] === ']') {
      this.pos++;
      return Value.list(values);
    }
    for (;;) {
      values.push(this.value());
      this.skipWhitespace();
      if (this.text[this.pos] === ',') {
        this.pos++;
        continue;
      }
      this.expect(']');
      return Value.list(values);
    }
  }

  private string(): string {
    const start = this.pos;
    this.expect('"');
    while (this.pos < this.text.length && this.text[this.pos] !== '"') {
      this.pos += this.text[this.pos] === '\\' ? 2 : 1;
    }
    this.expect('"');
    const decoded: unknown = JSON.parse(this.text.slice(start, this.pos));
    if (typeof decoded !== 'string') {
      throw this.unexpected();
    }
    return decoded;
  }

  private number(): Value {
    NUMBER_TOKEN.lastIndex = this.pos;
    const match = NUMBER_TOKEN.exec(this.text);
    if (!match) {
      throw this.unexpected();
    }
    this.pos += match[0].length;
    return Value.from(Number(match[0]));
  }

  private literal(word: string, value: Value): Value {
    if (!this.text.startsWith(word, this.pos)) {
      throw this.unexpected();
    }
    this.pos += word.length;
    return value;
  }

  private expect(char: string): void {
    if (this.text[this.pos] !== char) {
      throw this.unexpected();
    }
    this.pos++;
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && ' \t\n\r'.includes(this.text[this.pos])) {
      this.pos++;
    }
  }

  private unexpected(): DataError {
    return DataError.parse(`Unexpected JSON token at position ${this.pos}`);
  }
}

/**
 * Parse JSON text into Values: arrays become Lists, objects become Objects in document order
 */
export function parseJsonText(text: string): Value {
  try {
    JSON.parse(text);
  } catch (error) {
    throw DataError.parse(`Failed to parse JSON text: ${error instanceof Error ? error.message : String(error)}`);
  }
  return new JsonTextReader(text).read();
}
