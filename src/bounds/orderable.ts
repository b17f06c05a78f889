import type { OrderableValue, SupportedFieldType } from '../types.js';
import { InvalidBoundFormatError, InvalidFieldError } from '../utils/errors.js';

/**
 * Everything the partitioning and export algorithms need to know about the
 * type of the ordering field.
 */
export interface OrderableType {
    readonly fieldType: SupportedFieldType;
    compare(a: OrderableValue, b: OrderableValue): number;
    /** Deterministic split point; may collapse onto an endpoint for adjacent values. */
    midpoint(lower: OrderableValue, upper: OrderableValue): OrderableValue;
    serialize(value: OrderableValue): string;
    /** @throws InvalidBoundFormatError */
    deserialize(text: string): OrderableValue;
    /** Read the field value out of a returned document; null when absent. */
    fromDocument(raw: unknown): OrderableValue | null;
    /** OData literal used in `$filter` expressions */
    toLiteral(value: OrderableValue): string;
}

const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2}))?$/i;
const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

function compareNumbers(a: number, b: number): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

const dateTimeOffset: OrderableType = {
    fieldType: 'Edm.DateTimeOffset',
    compare: compareNumbers,
    midpoint: (lower, upper) => lower + Math.floor((upper - lower) / 2),
    serialize: (value) => new Date(value).toISOString(),
    deserialize(text) {
        const trimmed = text.trim();
        if (!ISO_DATE_TIME.test(trimmed)) {
            throw new InvalidBoundFormatError(text, 'Edm.DateTimeOffset');
        }
        // A bare date is read as UTC midnight, as Date.parse does for date-only forms
        const value = Date.parse(trimmed);
        if (Number.isNaN(value)) {
            throw new InvalidBoundFormatError(text, 'Edm.DateTimeOffset');
        }
        return value;
    },
    fromDocument(raw) {
        if (raw instanceof Date) {
            return raw.getTime();
        }
        if (typeof raw === 'string') {
            const value = Date.parse(raw);
            return Number.isNaN(value) ? null : value;
        }
        return null;
    },
    toLiteral: (value) => new Date(value).toISOString(),
};

function integerType(fieldType: 'Edm.Int32' | 'Edm.Int64', min: number, max: number): OrderableType {
    return {
        fieldType,
        compare: compareNumbers,
        midpoint: (lower, upper) => lower + Math.floor((upper - lower) / 2),
        serialize: (value) => String(value),
        deserialize(text) {
            const trimmed = text.trim();
            const value = Number(trimmed);
            if (!INTEGER.test(trimmed) || !Number.isSafeInteger(value) || value < min || value > max) {
                throw new InvalidBoundFormatError(text, fieldType);
            }
            return value;
        },
        fromDocument(raw) {
            const value = typeof raw === 'string' && INTEGER.test(raw) ? Number(raw) : raw;
            if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < min || value > max) {
                return null;
            }
            return value;
        },
        toLiteral: (value) => String(value),
    };
}

const double: OrderableType = {
    fieldType: 'Edm.Double',
    compare: compareNumbers,
    midpoint: (lower, upper) => lower / 2 + upper / 2,
    serialize: (value) => String(value),
    deserialize(text) {
        const trimmed = text.trim();
        const value = Number(trimmed);
        if (!DECIMAL.test(trimmed) || !Number.isFinite(value)) {
            throw new InvalidBoundFormatError(text, 'Edm.Double');
        }
        return value;
    },
    fromDocument(raw) {
        if (typeof raw === 'number' && Number.isFinite(raw)) {
            return raw;
        }
        return null;
    },
    toLiteral: (value) => (Number.isInteger(value) ? value.toFixed(1) : String(value)),
};

const orderableTypes: Record<SupportedFieldType, OrderableType> = {
    'Edm.DateTimeOffset': dateTimeOffset,
    'Edm.Int32': integerType('Edm.Int32', -2147483648, 2147483647),
    'Edm.Int64': integerType('Edm.Int64', Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER),
    'Edm.Double': double,
};

export const SUPPORTED_FIELD_TYPES: SupportedFieldType[] = [
    'Edm.DateTimeOffset',
    'Edm.Int32',
    'Edm.Int64',
    'Edm.Double',
];

export function isSupportedFieldType(fieldType: string): fieldType is SupportedFieldType {
    return SUPPORTED_FIELD_TYPES.some((supported) => supported === fieldType);
}

export function getOrderableType(fieldType: string): OrderableType {
    if (!isSupportedFieldType(fieldType)) {
        throw new InvalidFieldError(
            `Field type ${fieldType} is not supported, supported types ${SUPPORTED_FIELD_TYPES.join(', ')}`
        );
    }
    return orderableTypes[fieldType];
}
