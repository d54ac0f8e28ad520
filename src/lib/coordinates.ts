// ABOUTME: View rectangle over the complex plane and its pixel-to-plane mapping
// ABOUTME: Views are immutable; every derived field is computed in createView

export type Point = {
  x: number;
  y: number;
};

export type PixelPosition = {
  x: number;
  y: number;
};

export type PixelSize = {
  width: number;
  height: number;
};

/**
 * The visible region of the complex plane together with the pixel grid it is
 * rendered onto. `min` and `scale` are derived from `center`, the extents and
 * the grid size, and only ever computed together by createView().
 */
export type ViewState = Readonly<{
  /** Plane coordinate at the middle of the view (x = real, y = imaginary) */
  center: Readonly<Point>;
  /** Extent of the view along the real axis */
  width: number;
  /** Extent of the view along the imaginary axis */
  height: number;
  pixelWidth: number;
  pixelHeight: number;
  /** Bottom-left corner of the view in plane coordinates */
  min: Readonly<Point>;
  /** Plane units per pixel along each axis */
  scale: Readonly<Point>;
}>;

export type ViewInit = {
  center: Point;
  width: number;
  height: number;
  pixelWidth: number;
  pixelHeight: number;
};

export const DEFAULT_CENTER: Readonly<Point> = Object.freeze({ x: -0.5, y: 0 });
export const DEFAULT_VIEW_WIDTH = 3.0;

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid view ${name}: ${value}`);
  }
}

function assertPixelCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid view ${name}: ${value}`);
  }
}

/**
 * Builds a view, deriving its min corner and per-axis scale.
 */
export function createView({ center, width, height, pixelWidth, pixelHeight }: ViewInit): ViewState {
  assertPositive("width", width);
  assertPositive("height", height);
  assertPixelCount("pixelWidth", pixelWidth);
  assertPixelCount("pixelHeight", pixelHeight);
  if (!Number.isFinite(center.x) || !Number.isFinite(center.y)) {
    throw new Error(`Invalid view center: (${center.x}, ${center.y})`);
  }

  return Object.freeze({
    center: Object.freeze({ x: center.x, y: center.y }),
    width,
    height,
    pixelWidth,
    pixelHeight,
    min: Object.freeze({ x: center.x - width / 2, y: center.y - height / 2 }),
    scale: Object.freeze({ x: width / pixelWidth, y: height / pixelHeight }),
  });
}

/**
 * The startup view. Unless a height is given it follows the pixel aspect
 * ratio so that pixels are square in the plane.
 */
export function defaultView(
  pixelWidth: number,
  pixelHeight: number,
  options: { center?: Point; width?: number; height?: number } = {}
): ViewState {
  const width = options.width ?? DEFAULT_VIEW_WIDTH;
  return createView({
    center: options.center ?? DEFAULT_CENTER,
    width,
    height: options.height ?? (width * pixelHeight) / pixelWidth,
    pixelWidth,
    pixelHeight,
  });
}

/**
 * Plane coordinate at the centre of pixel (x, y). The pixel origin is the
 * top-left corner, so the imaginary axis is flipped: increasing y decreases
 * the imaginary part.
 */
export function pixelToPlane(view: ViewState, x: number, y: number): Point {
  return {
    x: view.scale.x * (x + 0.5) + view.min.x,
    y: view.scale.y * (view.pixelHeight - y - 1 + 0.5) + view.min.y,
  };
}

/**
 * Inverse of pixelToPlane. Returns fractional pixel coordinates.
 */
export function planeToPixel(view: ViewState, point: Point): PixelPosition {
  return {
    x: (point.x - view.min.x) / view.scale.x - 0.5,
    y: view.pixelHeight - 1 + 0.5 - (point.y - view.min.y) / view.scale.y,
  };
}

/**
 * Zoom-to-cursor.
 *
 * The target is located with the pre-zoom scale before the extents shrink;
 * doing it after would pick a different plane point.
 *
 * @param zoomFactor - Multiplier for both extents; below 1 zooms in
 */
export function zoomAt(view: ViewState, pixel: PixelPosition, zoomFactor: number): ViewState {
  if (!Number.isFinite(zoomFactor) || zoomFactor <= 0) {
    throw new Error(`Invalid zoom factor: ${zoomFactor}`);
  }

  const target = pixelToPlane(view, pixel.x, pixel.y);

  return createView({
    center: target,
    width: view.width * zoomFactor,
    height: view.height * zoomFactor,
    pixelWidth: view.pixelWidth,
    pixelHeight: view.pixelHeight,
  });
}

/**
 * Adapts a view to a new pixel grid, keeping its centre and real extent.
 */
export function resizeView(view: ViewState, pixelWidth: number, pixelHeight: number): ViewState {
  return createView({
    center: view.center,
    width: view.width,
    height: (view.width * pixelHeight) / pixelWidth,
    pixelWidth,
    pixelHeight,
  });
}
