import { Logger } from '@nestjs/common';
import { networkInterfaces } from 'os';
import { v4 as uuidv4 } from 'uuid';

/** 2021-01-01T00:00:00Z */
export const SNOWFLAKE_EPOCH_MS = 1609459200000n;

const MACHINE_BITS = 10n;
const SEQUENCE_BITS = 12n;
const MAX_MACHINE_ID = (1n << MACHINE_BITS) - 1n;
const MAX_SEQUENCE = (1n << SEQUENCE_BITS) - 1n;
const TIMESTAMP_SHIFT = MACHINE_BITS + SEQUENCE_BITS;

export type Clock = () => number;

/**
 * 16-bit FNV-1a fold of the first non-loopback MAC, masked to the machine field
 */
export function defaultMachineId(): number {
  const mac = Object.values(networkInterfaces())
    .flatMap(entries => entries ?? [])
    .find(entry => !entry.internal && entry.mac !== '00:00:00:00:00:00')?.mac;
  if (!mac) {
    return 0;
  }
  let hash = 0x811c9dc5;
  for (const part of mac.split(':')) {
    hash ^= parseInt(part, 16);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  const folded = ((hash >>> 16) ^ hash) & 0xffff;
  return folded & Number(MAX_MACHINE_ID);
}

/**
 * Monotone 64-bit ids: 41 bits of milliseconds since the epoch, 10 bits of machine, 12 bits of sequence
 */
export class SnowflakeGenerator {
  private readonly logger = new Logger(SnowflakeGenerator.name);
  private readonly machineId: bigint;
  private lastTimestamp = -1n;
  private sequence = 0n;

  constructor(machineId: number = defaultMachineId(), private readonly clock: Clock = Date.now) {
    if (!Number.isInteger(machineId) || machineId < 0 || BigInt(machineId) > MAX_MACHINE_ID) {
      throw new RangeError(`Machine id must be between 0 and ${MAX_MACHINE_ID}, got ${machineId}`);
    }
    this.machineId = BigInt(machineId);
  }

  nextId(): bigint {
    let timestamp = BigInt(this.clock());

    if (timestamp < this.lastTimestamp) {
      // Clock went backwards: move one tick past the last issued instant
      this.logger.warn(`Clock moved backwards by ${this.lastTimestamp - timestamp}ms`);
      timestamp = this.lastTimestamp + 1n;
      this.sequence = 0n;
    } else if (timestamp === this.lastTimestamp) {
      this.sequence = (this.sequence + 1n) & MAX_SEQUENCE;
      if (this.sequence === 0n) {
        timestamp = this.waitNextTick(this.lastTimestamp);
      }
    } else {
      this.sequence = 0n;
    }

    this.lastTimestamp = timestamp;
    return ((timestamp - SNOWFLAKE_EPOCH_MS) << TIMESTAMP_SHIFT) | (this.machineId << SEQUENCE_BITS) | this.sequence;
  }

  private waitNextTick(last: bigint): bigint {
    let timestamp = BigInt(this.clock());
    while (timestamp <= last) {
      timestamp = BigInt(this.clock());
    }
    return timestamp;
  }
}

/**
 * Split an id into its fields
 */
export function decomposeSnowflake(id: bigint): { timestamp: number; machineId: number; sequence: number } {
  return {
    timestamp: Number((id >> TIMESTAMP_SHIFT) + SNOWFLAKE_EPOCH_MS),
    machineId: Number((id >> SEQUENCE_BITS) & MAX_MACHINE_ID),
    sequence: Number(id & MAX_SEQUENCE),
  };
}

/**
 * Source of assigned primary keys
 */
export class IdentifierGenerator {
  constructor(private readonly snowflake: SnowflakeGenerator = new SnowflakeGenerator()) {}

  nextId(): bigint {
    return this.snowflake.nextId();
  }

  /**
   * Random v4 UUID without hyphens
   */
  nextUuid(): string {
    return uuidv4().replace(/-/g, '');
  }
}

let sharedGenerator: IdentifierGenerator | undefined;

/**
 * Process-wide generator, created on first use
 */
export function defaultIdentifierGenerator(): IdentifierGenerator {
  sharedGenerator ??= new IdentifierGenerator();
  return sharedGenerator;
}
