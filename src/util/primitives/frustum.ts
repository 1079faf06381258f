import {vec3, vec4, type ReadonlyMat4, type ReadonlyVec3, type ReadonlyVec4} from 'gl-matrix';
import {Aabb} from './aabb';

const clipSpaceCorners: ReadonlyArray<[number, number, number, number]> = [
    [-1, 1, -1, 1],
    [1, 1, -1, 1],
    [1, -1, -1, 1],
    [-1, -1, -1, 1],
    [-1, 1, 1, 1],
    [1, 1, 1, 1],
    [1, -1, 1, 1],
    [-1, -1, 1, 1]
];

const frustumPlanePointIndices: ReadonlyArray<[number, number, number]> = [
    [0, 1, 2],  // near
    [6, 5, 4],  // far
    [0, 3, 7],  // left
    [2, 1, 5],  // right
    [3, 2, 6],  // bottom
    [0, 4, 5]   // top
];

/**
 * Signed distance of `point` to `plane`, positive on the side the plane normal points to.
 */
export function pointPlaneSignedDistance(plane: ReadonlyVec4, point: ReadonlyVec3): number {
    return plane[0] * point[0] + plane[1] * point[1] + plane[2] * point[2] + plane[3];
}

/**
 * A view frustum given by its eight corner points and six planes whose normals point inwards.
 */
export class Frustum {

    constructor(public points: vec3[], public planes: vec4[], public aabb: Aabb) { }

    /**
     * Builds the frustum of a camera from the inverse of its view-projection matrix.
     * Corners are returned near plane first, in clip space order top-left, top-right, bottom-right, bottom-left.
     */
    public static fromInvViewProjectionMatrix(invViewProj: ReadonlyMat4): Frustum {
        const frustumCoords = clipSpaceCorners.map(v => unprojectClipSpacePoint(v, invViewProj));

        const centroid: vec3 = [0, 0, 0];
        for (const p of frustumCoords) {
            vec3.add(centroid, centroid, p);
        }
        vec3.scale(centroid, centroid, 1 / frustumCoords.length);

        const frustumPlanes = frustumPlanePointIndices.map((p) => {
            const a = vec3.sub([0, 0, 0], frustumCoords[p[0]], frustumCoords[p[1]]);
            const b = vec3.sub([0, 0, 0], frustumCoords[p[2]], frustumCoords[p[1]]);
            const n = vec3.normalize([0, 0, 0], vec3.cross([0, 0, 0], a, b));
            const plane: vec4 = [n[0], n[1], n[2], -vec3.dot(n, frustumCoords[p[1]])];
            // handedness of the projection decides the winding, so orient every plane towards the inside
            if (pointPlaneSignedDistance(plane, centroid) < 0) {
                vec4.negate(plane, plane);
            }
            return plane;
        });

        const min: vec3 = [Number.POSITIVE_INFINITY, Number.POSITIVE_INFINITY, Number.POSITIVE_INFINITY];
        const max: vec3 = [Number.NEGATIVE_INFINITY, Number.NEGATIVE_INFINITY, Number.NEGATIVE_INFINITY];

        for (const p of frustumCoords) {
            for (let i = 0; i < 3; i++) {
                min[i] = Math.min(min[i], p[i]);
                max[i] = Math.max(max[i], p[i]);
            }
        }

        return new Frustum(frustumCoords, frustumPlanes, new Aabb(min, max));
    }
}

function unprojectClipSpacePoint(point: [number, number, number, number], invViewProj: ReadonlyMat4): vec3 {
    const v = vec4.transformMat4([0, 0, 0, 0], point, invViewProj);
    return [v[0] / v[3], v[1] / v[3], v[2] / v[3]];
}
