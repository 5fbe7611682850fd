import type { DistanceMetric } from "../../config/types";

export type DistanceFunction = (a: readonly number[], b: readonly number[]) => number;

/**
 * 1 - cosine similarity. A zero vector is treated as unrelated to everything.
 */
export function cosineDistance(a: readonly number[], b: readonly number[]): number {
    let dotProduct = 0;
    let magnitudeA = 0;
    let magnitudeB = 0;

    for (let i = 0; i < a.length; i++) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dotProduct += x * y;
        magnitudeA += x * x;
        magnitudeB += y * y;
    }

    if (magnitudeA === 0 || magnitudeB === 0) {
        return 1;
    }

    return 1 - dotProduct / (Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB));
}

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        const diff = (a[i] ?? 0) - (b[i] ?? 0);
        sum += diff * diff;
    }
    return Math.sqrt(sum);
}

export const DISTANCE_FUNCTIONS: Record<DistanceMetric, DistanceFunction> = {
    cosine: cosineDistance,
    euclidean: euclideanDistance,
};
