import 'reflect-metadata';

export * from './common/errors';
export * from './common/types';
export { Row, type ColumnKey } from './data/row';
export { Rows } from './data/rows';
export { Value, toValue, type ValueInput, type ValueKind, type JsonValue } from './value/value';
export { Converters, createConverter, type Converter, type ConversionResult } from './value/convert';
export { valueToText, valueToJson, valueToJsonText, describeValue } from './value/format';
export { parseJsonText } from './value/json-text';
export { IdentifierGenerator, SnowflakeGenerator, defaultIdentifierGenerator, decomposeSnowflake } from './identifier/snowflake';
export { Table, TableId, TableField, type TableOptions, type TableFieldOptions, type TableIdOptions } from './metadata/decorators';
export { IdentifierType, type FieldName, type FillMode } from './metadata/field-name';
export { TableName } from './metadata/table-name';
export { describeEntity, type EntityClass, type EntityMetadata } from './metadata/entity-metadata';
export { Wrapper, type OrderDirection, type JoinType } from './wrapper/wrapper';
export { Dialect, IdStrategy } from './dialect/dialect';
export { createDialect } from './dialect/dialect.factory';
export { ExecuteContext } from './execution/execute-context';
export { ExecuteResult } from './execution/execute-result';
export { InterceptorType, BaseInterceptor, type Interceptor } from './interceptor/interceptor';
export { InterceptorBuilder } from './interceptor/interceptor.builder';
export { InterceptorChain } from './interceptor/interceptor-chain';
export { LoggingInterceptor, type LoggingInterceptorOptions } from './interceptor/logging.interceptor';
export { SqlInjectionDetector, Severity, Verdict, type DetectionResult } from './security/sql-injection.detector';
export { DriverAdapter, type DriverConnection } from './driver/driver';
export { createDriver } from './driver/driver.factory';
export { DatabaseConfig, loadDatabaseConfig } from './config/database.config';
export { MapperConfig, loadMapperConfig } from './config/mapper.config';
export { BaseMapper, type RowReader } from './mapper/base-mapper';
export { MapperService, MAPPER_RUNTIME } from './mapper/mapper.service';
export { MapperModule } from './mapper/mapper.module';
export { createRuntime, type RuntimeOptions } from './mapper/mapper.runtime';
export type { EntityId, IPage, MapperRuntime, RawParams } from './mapper/mapper.types';
export { Transaction, TransactionState } from './transaction/transaction';
export { EntityRepository } from './repository/entity.repository';
export { QueryBuilder } from './repository/query.builder';
export { UpdateBuilder } from './repository/update.builder';
