/**
 * @ocrsets/imaging -- default image backend for the sample generator.
 */
export { SharpImageOps, readImage, readAndFit, writePng } from "./image.js";
export { warpBox } from "./warp.js";
export {
  convexHull,
  minAreaRect,
  orderCorners,
  rotatedBox,
  boxSize,
  perspectiveTransform,
  applyHomography,
  type Homography,
} from "./geometry.js";
