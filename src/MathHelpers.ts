import { mat4, quat, ReadonlyQuat, ReadonlyVec3 } from "gl-matrix";

// Misc bits of 3D math.

// Basic scalar constants.
export const enum MathConstants {
    TAU = 6.283185307179586, // Math.PI * 2
}

export function clamp(v: number, min: number, max: number): number {
    return Math.max(min, Math.min(v, max));
}

export function isNearZero(v: number, min: number): boolean {
    return v > -min && v < min;
}

export function setMatrixTranslation(dst: mat4, v: ReadonlyVec3): void {
    dst[12] = v[0];
    dst[13] = v[1];
    dst[14] = v[2];
}

/**
 * Spherical interpolation from {@param a} to {@param b} along the shorter arc. Falls back to a
 * plain weighted sum when the two are within 1e-5 of each other, and, unlike {@link quat.slerp},
 * never renormalizes.
 */
export function quatSlerpShortest(dst: quat, a: ReadonlyQuat, b: ReadonlyQuat, t: number): quat {
    let cosOmega = a[0] * b[0] + a[1] * b[1] + a[2] * b[2] + a[3] * b[3];

    let sign = 1.0;
    if (cosOmega < 0.0) {
        cosOmega = -cosOmega;
        sign = -1.0;
    }

    let scaleA: number, scaleB: number;
    if ((1.0 - cosOmega) > 0.00001) {
        const omega = Math.acos(cosOmega);
        const sinOmega = Math.sin(omega);
        scaleA = Math.sin((1.0 - t) * omega) / sinOmega;
        scaleB = sign * Math.sin(t * omega) / sinOmega;
    } else {
        scaleA = 1.0 - t;
        scaleB = sign * t;
    }

    return quat.set(dst,
        scaleA * a[0] + scaleB * b[0],
        scaleA * a[1] + scaleB * b[1],
        scaleA * a[2] + scaleB * b[2],
        scaleA * a[3] + scaleB * b[3],
    );
}
