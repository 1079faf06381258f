import {type ReadonlyVec3, type ReadonlyVec4, type vec3} from 'gl-matrix';
import {type Frustum} from './frustum';

export const enum IntersectionResult {
    None = 0,
    Partial = 1,
    Full = 2,
}

/**
 * An axis aligned bounding box in world space.
 */
export class Aabb {
    readonly min: ReadonlyVec3;
    readonly max: ReadonlyVec3;
    readonly center: ReadonlyVec3;

    constructor(min_: ReadonlyVec3, max_: ReadonlyVec3) {
        this.min = min_;
        this.max = max_;
        this.center = [
            (min_[0] + max_[0]) * 0.5,
            (min_[1] + max_[1]) * 0.5,
            (min_[2] + max_[2]) * 0.5
        ];
    }

    size(): vec3 {
        return [this.max[0] - this.min[0], this.max[1] - this.min[1], this.max[2] - this.min[2]];
    }

    /**
     * Extent along the x axis.
     */
    get width(): number {
        return this.max[0] - this.min[0];
    }

    contains(point: ReadonlyVec3): boolean {
        for (let i = 0; i < 3; i++) {
            if (point[i] < this.min[i] || point[i] > this.max[i]) return false;
        }
        return true;
    }

    /**
     * Euclidean distance from `point` to the closest point of the box, 0 if the point lies inside.
     */
    distanceTo(point: ReadonlyVec3): number {
        let distanceSq = 0;
        for (let i = 0; i < 3; i++) {
            const d = Math.max(this.min[i] - point[i], 0, point[i] - this.max[i]);
            distanceSq += d * d;
        }
        return Math.sqrt(distanceSq);
    }

    /**
     * Performs a frustum-aabb intersection test.
     */
    intersectsFrustum(frustum: Frustum): IntersectionResult {
        // Execute separating axis test between two convex objects to find intersections
        // Each frustum plane together with 3 major axes define the separating axes
        let fullyInside = true;

        for (let p = 0; p < frustum.planes.length; p++) {
            const planeIntersection = this.intersectsPlane(frustum.planes[p]);

            if (planeIntersection === IntersectionResult.None) {
                return IntersectionResult.None;
            }
            if (planeIntersection === IntersectionResult.Partial) {
                fullyInside = false;
            }
        }

        if (fullyInside) {
            return IntersectionResult.Full;
        }

        const bounds = frustum.aabb;
        if (bounds.min[0] > this.max[0] || bounds.min[1] > this.max[1] || bounds.min[2] > this.max[2] ||
            bounds.max[0] < this.min[0] || bounds.max[1] < this.min[1] || bounds.max[2] < this.min[2]) {
            return IntersectionResult.None;
        }

        return IntersectionResult.Partial;
    }

    /**
     * Performs a halfspace-aabb intersection test. The positive side of the plane counts as inside.
     */
    intersectsPlane(plane: ReadonlyVec4): IntersectionResult {
        let distMin = plane[3];
        let distMax = plane[3];
        for (let i = 0; i < 3; i++) {
            if (plane[i] > 0) {
                distMin += plane[i] * this.min[i];
                distMax += plane[i] * this.max[i];
            } else {
                distMax += plane[i] * this.min[i];
                distMin += plane[i] * this.max[i];
            }
        }

        if (distMin >= 0) {
            return IntersectionResult.Full;
        }
        if (distMax < 0) {
            return IntersectionResult.None;
        }
        return IntersectionResult.Partial;
    }
}
