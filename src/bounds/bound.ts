import type { OrderableValue } from '../types.js';
import type { QueryBackend, RangeFilter, SortDirection } from '../search/backend.js';
import { getOrderableType, SUPPORTED_FIELD_TYPES, type OrderableType } from './orderable.js';
import { EmptyCollectionError, InvalidBoundFormatError } from '../utils/errors.js';

async function findBound(
    backend: QueryBackend,
    field: string,
    orderable: OrderableType,
    direction: SortDirection
): Promise<OrderableValue> {
    const [document] = await backend.query({
        filter: null,
        orderBy: { field, direction },
        skip: 0,
        top: 1,
        excludeMissing: true,
    });
    if (!document) {
        throw new EmptyCollectionError(field);
    }

    const raw = document[field];
    if (raw === null || raw === undefined) {
        throw new EmptyCollectionError(field);
    }
    const value = orderable.fromDocument(raw);
    if (value === null) {
        throw new InvalidBoundFormatError(String(raw), orderable.fieldType);
    }
    return value;
}

export function findLowerBound(
    backend: QueryBackend,
    field: string,
    orderable: OrderableType
): Promise<OrderableValue> {
    return findBound(backend, field, orderable, 'asc');
}

export function findUpperBound(
    backend: QueryBackend,
    field: string,
    orderable: OrderableType
): Promise<OrderableValue> {
    return findBound(backend, field, orderable, 'desc');
}

export function serializeBound(value: OrderableValue, orderable: OrderableType): string {
    return orderable.serialize(value);
}

export function deserializeBound(text: string, orderable: OrderableType): OrderableValue {
    return orderable.deserialize(text);
}

/**
 * Whether `text` reads as a bound for any supported field type. Lets bounds
 * be checked before the field's actual type is known.
 */
export function isWellFormedBound(text: string): boolean {
    return SUPPORTED_FIELD_TYPES.some((fieldType) => {
        try {
            getOrderableType(fieldType).deserialize(text);
            return true;
        } catch (error) {
            if (error instanceof InvalidBoundFormatError) return false;
            throw error;
        }
    });
}

export function buildRangeFilter(
    field: string,
    lower: OrderableValue,
    upper: OrderableValue,
    upperInclusive: boolean
): RangeFilter {
    return { field, lower, upper, upperInclusive };
}

/** `field ge lower and field lt upper`, or `le upper` when the upper bound is inclusive */
export function toODataFilter(filter: RangeFilter, orderable: OrderableType): string {
    const upperOperator = filter.upperInclusive ? 'le' : 'lt';
    return (
        `${filter.field} ge ${orderable.toLiteral(filter.lower)} and ` +
        `${filter.field} ${upperOperator} ${orderable.toLiteral(filter.upper)}`
    );
}

export function describeRange(filter: RangeFilter, orderable: OrderableType): string {
    const close = filter.upperInclusive ? ']' : ')';
    return `[${orderable.serialize(filter.lower)}, ${orderable.serialize(filter.upper)}${close}`;
}
