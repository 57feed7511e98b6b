import type { RenderBandRequest } from './renderBandProtocol';
import { handleRenderBandRequest } from './renderBandProtocol';

self.onmessage = (event: MessageEvent<RenderBandRequest>) => {
  self.postMessage(handleRenderBandRequest(event.data));
};
