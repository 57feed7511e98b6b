import { forwardRef, useCallback, useEffect, useRef } from 'react';
import type { PixelBuffer } from '../utils/trace/pixels';
import { toRgbaPixels } from '../utils/trace/pixels';

interface FramebufferCanvasProps {
  /** RGB24 pixels, `width * height * 3` bytes. */
  pixels: PixelBuffer;
  width: number;
  height: number;
  className?: string;
}

/**
 * Presents a packed RGB24 image. Owns no rendering logic; it only copies bytes into the canvas.
 */
export const FramebufferCanvas = forwardRef<HTMLCanvasElement, FramebufferCanvasProps>(
  function FramebufferCanvas({ pixels, width, height, className }, ref) {
    const canvasRef = useRef<HTMLCanvasElement | null>(null);

    // Keep a local handle for drawing and hand the same node to the parent.
    const setCanvas = useCallback(
      (node: HTMLCanvasElement | null) => {
        canvasRef.current = node;
        if (typeof ref === 'function') {
          ref(node);
        } else if (ref) {
          ref.current = node;
        }
      },
      [ref],
    );

    useEffect(() => {
      const canvas = canvasRef.current;
      if (!canvas) return;

      const ctx = canvas.getContext('2d');
      if (!ctx) {
        console.warn('[FramebufferCanvas] 2D context unavailable');
        return;
      }

      const image = ctx.createImageData(width, height);
      image.data.set(toRgbaPixels(pixels, width, height));
      ctx.putImageData(image, 0, 0);
    }, [pixels, width, height]);

    return (
      <canvas
        ref={setCanvas}
        width={width}
        height={height}
        className={className}
        style={{ imageRendering: 'pixelated' }}
        data-testid="framebuffer-canvas"
      />
    );
  },
);
