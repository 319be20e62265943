import {
  defaultViewState,
  mergeViewport,
  type ViewResult,
  type ViewSelection,
  type ViewState,
  type ViewportChange,
} from '@world-disasters/shared';

export type ViewRequestBody = ViewSelection & {
  viewport: ViewportChange | null;
  viewState: ViewState;
};

export type PendingView = {
  requestId: number;
  body: ViewRequestBody;
};

/**
 * Browser-side view state for one dashboard session.
 * Viewport events are folded in when a request is sent, so a later request
 * carries them even if an earlier response is dropped as stale.
 */
export class ViewSession {
  private viewState: ViewState;
  private latestRequest = 0;

  constructor(initial: ViewState = defaultViewState()) {
    this.viewState = initial;
  }

  get current(): ViewState {
    return this.viewState;
  }

  prepare(selection: ViewSelection, viewport: ViewportChange | null = null): PendingView {
    this.viewState = mergeViewport(this.viewState, viewport);
    this.latestRequest += 1;
    return {
      requestId: this.latestRequest,
      body: { year: selection.year, disasterType: selection.disasterType, viewport, viewState: this.viewState },
    };
  }

  /** Returns the result when it answers the newest request, otherwise null. */
  accept(requestId: number, result: ViewResult | undefined): ViewResult | null {
    if (!result || requestId !== this.latestRequest) return null;
    this.viewState = result.viewState;
    return result;
  }
}
