import { createStore } from "zustand/vanilla";

import { defaultView, PixelPosition, Point, resizeView, ViewState, zoomAt } from "@/lib/coordinates";

export const DEFAULT_ZOOM_FACTOR = 0.5;

export const MIN_ITERATIONS = 1;
export const MAX_ITERATIONS = 10_000;

type State = {
  view: ViewState;
  zoomFactor: number;
  zoomCount: number;
};

type Actions = {
  zoomAt: (pixel: PixelPosition) => ViewState;
  resize: (pixelWidth: number, pixelHeight: number) => ViewState;
};

export type ViewStore = ReturnType<typeof createViewStore>;

export type ViewStoreOptions = {
  pixelWidth: number;
  pixelHeight: number;
  center?: Point;
  width?: number;
  zoomFactor?: number;
};

/**
 * Store owning the current view. Only the input side calls its actions;
 * every action replaces `view` with a new frozen ViewState, so a snapshot
 * read with getState() is never mutated afterwards.
 */
export const createViewStore = ({ pixelWidth, pixelHeight, center, width, zoomFactor }: ViewStoreOptions) => {
  const initialState: State = {
    view: defaultView(pixelWidth, pixelHeight, { center, width }),
    zoomFactor: zoomFactor ?? DEFAULT_ZOOM_FACTOR,
    zoomCount: 0,
  };

  return createStore<State & Actions>()((set, get) => ({
    ...initialState,

    zoomAt: (pixel) => {
      const { view, zoomFactor: factor, zoomCount } = get();
      const next = zoomAt(view, pixel, factor);
      set({ view: next, zoomCount: zoomCount + 1 });
      return next;
    },
    resize: (newPixelWidth, newPixelHeight) => {
      const next = resizeView(get().view, newPixelWidth, newPixelHeight);
      set({ view: next });
      return next;
    },
  }));
};

/**
 * Iteration budget for a view of the given real extent: 64 + 4·log10(1/width).
 * The budget grows as the view narrows. It is clamped to
 * [MIN_ITERATIONS, MAX_ITERATIONS] because the raw formula goes negative for
 * huge widths and unbounded as the width approaches zero.
 */
export const derivedMaxIterations = (width: number): number => {
  if (!Number.isFinite(width) || width <= 0) {
    return MAX_ITERATIONS;
  }

  const iterations = Math.floor(64 + 4 * Math.log10(1 / width));
  return Math.max(MIN_ITERATIONS, Math.min(MAX_ITERATIONS, iterations));
};
