/**
 * Device Frame Conventions
 * ========================
 * Coordinate frame and display-rotation definitions for the handheld.
 *
 * All fusion code takes its axis remapping from this file.
 *
 * @module conventions
 */

import * as THREE from 'three';
import type { DisplayRotation, Vec3Tuple } from '../../engine/types';

// ============================================================================
// DEVICE FRAME
// ============================================================================

/*
 * DEVICE FRAME (D) - natural (portrait) orientation
 *
 * Right-handed coordinate system, screen facing up:
 *   X → Right edge
 *   Y → Top edge
 *   Z → Out of the screen
 *
 * The accelerometer reports +Z ≈ +9.81 m/s² lying flat and still.
 */

// ============================================================================
// GRAVITY
// ============================================================================

/** Standard gravity (m/s²), used when building accel zero offsets */
export const STANDARD_GRAVITY = 9.80665;

// ============================================================================
// DISPLAY ROTATION
// ============================================================================

function permutation(
    n11: number, n12: number, n13: number,
    n21: number, n22: number, n23: number,
): THREE.Matrix3 {
    return new THREE.Matrix3().set(n11, n12, n13, n21, n22, n23, 0, 0, 1);
}

/**
 * Axis permutations that bring a sample from the device frame into the
 * frame of the current display rotation. Z is never touched.
 *
 *   0°:   ( x,  y, z)
 *   90°:  (-y,  x, z)
 *   180°: (-x, -y, z)
 *   270°: ( y, -x, z)
 */
export const DISPLAY_ROTATION_MATRICES: Readonly<Record<DisplayRotation, THREE.Matrix3>> = {
    0: permutation(1, 0, 0, 0, 1, 0),
    90: permutation(0, -1, 0, 1, 0, 0),
    180: permutation(-1, 0, 0, 0, -1, 0),
    270: permutation(0, 1, 0, -1, 0, 0),
};

/**
 * Remap a raw sensor vector for the display rotation.
 * Returns a new vector; the input tuple is not modified.
 */
export function remapForDisplay(v: Readonly<Vec3Tuple>, rotation: DisplayRotation): THREE.Vector3 {
    return new THREE.Vector3(v[0], v[1], v[2]).applyMatrix3(DISPLAY_ROTATION_MATRICES[rotation]);
}
