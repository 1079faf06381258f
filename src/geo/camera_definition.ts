import {mat4, type ReadonlyMat4, type ReadonlyVec3} from 'gl-matrix';
import {Frustum} from '../util/primitives/frustum';
import {degreesToRadians} from '../util/util';
import type {Size} from '../util/image';

export type CameraDefinitionOptions = {
    /**
     * Eye position in world coordinates (web mercator metres, z is the altitude).
     */
    position: ReadonlyVec3;
    /**
     * Point the camera looks at.
     */
    target: ReadonlyVec3;
    /**
     * Up direction. Must not be parallel to the viewing direction.
     * @defaultValue [0, 0, 1]
     */
    up?: ReadonlyVec3;
    /**
     * Vertical field of view, in degrees.
     * @defaultValue 75
     */
    fieldOfView?: number;
    /**
     * @defaultValue 10
     */
    nearPlane?: number;
    /**
     * @defaultValue 100000
     */
    farPlane?: number;
    /**
     * Viewport size in pixels.
     * @defaultValue 1920x1080
     */
    viewportSize?: Size;
};

const defaultOptions: Required<Omit<CameraDefinitionOptions, 'position' | 'target'>> = {
    up: [0, 0, 1],
    fieldOfView: 75,
    nearPlane: 10,
    farPlane: 100000,
    viewportSize: {width: 1920, height: 1080}
};

function createMat4f64(): mat4 {
    return new Float64Array(16);
}

/**
 * Pose and projection of the camera the tile scheduler selects tiles for.
 * Instances are immutable: to move the camera, create a new definition.
 */
export class CameraDefinition {
    readonly options: Required<CameraDefinitionOptions>;
    readonly viewMatrix: ReadonlyMat4;
    readonly projectionMatrix: ReadonlyMat4;
    readonly viewProjectionMatrix: ReadonlyMat4;
    private readonly _frustum: Frustum;
    private readonly _distanceScalingFactor: number;

    constructor(options: CameraDefinitionOptions) {
        const resolved = {...defaultOptions, ...options};
        const {width, height} = resolved.viewportSize;
        if (!(width > 0) || !(height > 0)) {
            throw new RangeError(`viewport size must be positive, got ${width}x${height}`);
        }
        if (!(resolved.nearPlane > 0) || !(resolved.farPlane > resolved.nearPlane)) {
            throw new RangeError(`invalid clipping planes near=${resolved.nearPlane} far=${resolved.farPlane}`);
        }
        this.options = resolved;

        const fovy = degreesToRadians(resolved.fieldOfView);
        this.viewMatrix = mat4.lookAt(createMat4f64(), resolved.position, resolved.target, resolved.up);
        this.projectionMatrix = mat4.perspective(createMat4f64(), fovy, width / height, resolved.nearPlane, resolved.farPlane);
        this.viewProjectionMatrix = mat4.multiply(createMat4f64(), this.projectionMatrix, this.viewMatrix);

        const invViewProjection = mat4.invert(createMat4f64(), this.viewProjectionMatrix);
        if (!invViewProjection) {
            throw new Error('camera view-projection matrix is not invertible; check that up is not parallel to the viewing direction');
        }
        this._frustum = Frustum.fromInvViewProjectionMatrix(invViewProjection);
        this._distanceScalingFactor = height / (2 * Math.tan(fovy / 2));
    }

    get position(): ReadonlyVec3 {
        return this.options.position;
    }

    get viewportSize(): Size {
        return this.options.viewportSize;
    }

    frustum(): Frustum {
        return this._frustum;
    }

    /**
     * Converts a length in world units, seen at `distance` from the camera, to pixels on screen.
     */
    toScreenSpace(worldSpaceSize: number, distance: number): number {
        return worldSpaceSize * this._distanceScalingFactor / distance;
    }

    withViewportSize(viewportSize: Size): CameraDefinition {
        return new CameraDefinition({...this.options, viewportSize});
    }
}
