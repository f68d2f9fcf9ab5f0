import { Logger } from '@nestjs/common';
import { IdentifierGenerator, SNOWFLAKE_EPOCH_MS, SnowflakeGenerator, decomposeSnowflake } from './snowflake';

describe('SnowflakeGenerator', () => {
  const base = Number(SNOWFLAKE_EPOCH_MS) + 1000;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should pack time, machine and sequence', () => {
    const generator = new SnowflakeGenerator(3, () => base);
    const first = generator.nextId();
    const second = generator.nextId();

    expect(first).toBe((1000n << 22n) | (3n << 12n));
    expect(decomposeSnowflake(second)).toEqual({ timestamp: base, machineId: 3, sequence: 1 });
  });

  it('should produce strictly increasing ids', () => {
    let now = base;
    const generator = new SnowflakeGenerator(1, () => now);
    const ids: bigint[] = [];
    for (let i = 0; i < 50; i++) {
      if (i % 7 === 0) {
        now += 1;
      }
      ids.push(generator.nextId());
    }
    for (let i = 1; i < ids.length; i++) {
      expect(ids[i] > ids[i - 1]).toBe(true);
    }
  });

  it('should never reuse an instant after the clock moves back', () => {
    let now = base + 10;
    const generator = new SnowflakeGenerator(0, () => now);
    const before = generator.nextId();
    now = base;
    const after = generator.nextId();

    expect(after > before).toBe(true);
    expect(decomposeSnowflake(after).timestamp).toBe(base + 11);
  });

  it('should wait for the next tick when the sequence is exhausted', () => {
    let calls = 0;
    // Clock stays put through the 4097th id, then advances
    const generator = new SnowflakeGenerator(0, () => {
      calls += 1;
      return calls > 4097 ? base + 1 : base;
    });
    let last = 0n;
    for (let i = 0; i < 4097; i++) {
      last = generator.nextId();
    }
    expect(decomposeSnowflake(last)).toEqual({ timestamp: base + 1, machineId: 0, sequence: 0 });
  });

  it('should reject machine ids outside ten bits', () => {
    expect(() => new SnowflakeGenerator(1024)).toThrow(RangeError);
  });
});

describe('IdentifierGenerator', () => {
  it('should produce hyphen-less uuids', () => {
    const uuid = new IdentifierGenerator(new SnowflakeGenerator(0)).nextUuid();
    expect(uuid).toMatch(/^[0-9a-f]{12}4[0-9a-f]{19}$/);
  });
});
