import { Vec2Like } from '../interface';

export type TriangulationErrorKind =
    | 'DuplicatePoint'
    | 'DegenerateInput'
    | 'NumericalInconsistency'
    | 'InvalidCoordinate';

export interface TriangulationErrorDetails {
    /** Input index of the offending point. */
    index?: number;
    /** Input index of the point it coincides with (DuplicatePoint only). */
    duplicateOf?: number;
}

export class TriangulationError extends Error {
    readonly kind: TriangulationErrorKind;
    readonly index?: number;
    readonly duplicateOf?: number;

    constructor(kind: TriangulationErrorKind, message: string, details: TriangulationErrorDetails = {}) {
        super(message);
        this.name = 'TriangulationError';
        this.kind = kind;
        this.index = details.index;
        this.duplicateOf = details.duplicateOf;
    }

    static duplicatePoint(index: number, duplicateOf: number): TriangulationError {
        return new TriangulationError(
            'DuplicatePoint',
            `point ${index} coincides with point ${duplicateOf}`,
            { index, duplicateOf },
        );
    }

    static degenerateInput(vertexCount: number): TriangulationError {
        return new TriangulationError(
            'DegenerateInput',
            `need at least 3 non-collinear points, got ${vertexCount} point(s) on a common line`,
        );
    }

    static numericalInconsistency(detail: string): TriangulationError {
        return new TriangulationError('NumericalInconsistency', `internal invariant violated: ${detail}`);
    }

    static invalidCoordinate(index: number, point: Vec2Like): TriangulationError {
        return new TriangulationError(
            'InvalidCoordinate',
            `point ${index} has an unsupported coordinate (${point.x}, ${point.y})`,
            { index },
        );
    }
}

export function isTriangulationError(e: unknown): e is TriangulationError {
    return e instanceof TriangulationError;
}
