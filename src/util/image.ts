export type Size = {
    width: number;
    height: number;
};

function createImage<T extends Uint8Array | Uint16Array>(size: Size, channels: number, data: T | undefined, create: (length: number) => T): T {
    const {width, height} = size;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
        throw new RangeError(`invalid image size ${width}x${height}`);
    }
    if (!data) {
        return create(width * height * channels);
    }
    if (data.length !== width * height * channels) {
        throw new RangeError(`mismatched image size. expected: ${width * height * channels} but got: ${data.length}`);
    }
    return data;
}

/**
 * An image with four 8 bit channels per pixel, stored row by row.
 * Instances handed to the scheduler are shared by reference and must not be written to.
 */
export class RGBAImage {
    readonly width: number;
    readonly height: number;
    readonly data: Uint8Array;

    constructor(size: Size, data?: Uint8Array) {
        this.width = size.width;
        this.height = size.height;
        this.data = createImage(size, 4, data, (length) => new Uint8Array(length));
    }

    /**
     * Creates an image where every pixel has the given colour.
     */
    static filled(size: Size, rgba: [number, number, number, number]): RGBAImage {
        const image = new RGBAImage(size);
        for (let i = 0; i < image.data.length; i += 4) {
            image.data[i] = rgba[0];
            image.data[i + 1] = rgba[1];
            image.data[i + 2] = rgba[2];
            image.data[i + 3] = rgba[3];
        }
        return image;
    }

    getPixel(x: number, y: number): [number, number, number, number] {
        const i = (y * this.width + x) * 4;
        return [this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]];
    }
}

/**
 * A single channel raster of 16 bit heights, stored row by row.
 */
export class HeightRaster {
    readonly width: number;
    readonly height: number;
    readonly data: Uint16Array;

    constructor(size: Size, data?: Uint16Array) {
        this.width = size.width;
        this.height = size.height;
        this.data = createImage(size, 1, data, (length) => new Uint16Array(length));
    }

    getValue(x: number, y: number): number {
        return this.data[y * this.width + x];
    }
}
