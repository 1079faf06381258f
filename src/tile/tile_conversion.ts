import {HeightRaster, RGBAImage} from '../util/image';

/**
 * Unpacks an elevation image into a height raster. Each pixel carries a
 * 16 bit height with the high byte in red and the low byte in green.
 */
export function rgbaToHeightRaster(image: RGBAImage): HeightRaster {
    const raster = new HeightRaster({width: image.width, height: image.height});
    const pixels = image.data;
    for (let i = 0; i < raster.data.length; i++) {
        raster.data[i] = (pixels[i * 4] << 8) | pixels[i * 4 + 1];
    }
    return raster;
}

/**
 * White imagery used for children whose imagery is not available.
 */
export function createDefaultOrthoTile(tileSize: number): RGBAImage {
    return RGBAImage.filled({width: tileSize, height: tileSize}, [255, 255, 255, 255]);
}

/**
 * Flat elevation used for children whose height data is not available.
 */
export function createDefaultHeightTile(tileSize: number): HeightRaster {
    return new HeightRaster({width: tileSize, height: tileSize});
}
