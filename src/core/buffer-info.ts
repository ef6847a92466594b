/**
 * Plain-object description of a buffer handle
 */

import type { VideoFrameBufferType } from '../formats/index.js';
import {
  BiplanarYuvBuffer,
  I420ABuffer,
  PlanarYuvBuffer,
  type VideoFrameBuffer,
} from './VideoFrameBuffer.js';

export interface PlanarYuvBufferInfo {
  chromaWidth: number;
  chromaHeight: number;
  strideY: number;
  strideU: number;
  strideV: number;
  /** Present for I420A */
  strideA?: number;
}

export interface BiplanarYuvBufferInfo {
  chromaWidth: number;
  chromaHeight: number;
  strideY: number;
  strideUV: number;
}

export interface VideoFrameBufferInfo {
  type: VideoFrameBufferType;
  width: number;
  height: number;
  yuv?: PlanarYuvBufferInfo;
  biYuv?: BiplanarYuvBufferInfo;
}

export function getBufferInfo(handle: VideoFrameBuffer): VideoFrameBufferInfo {
  const info: VideoFrameBufferInfo = {
    type: handle.bufferType,
    width: handle.width,
    height: handle.height,
  };

  if (handle instanceof PlanarYuvBuffer) {
    info.yuv = {
      chromaWidth: handle.chromaWidth,
      chromaHeight: handle.chromaHeight,
      strideY: handle.strideY,
      strideU: handle.strideU,
      strideV: handle.strideV,
    };
    if (handle instanceof I420ABuffer) {
      info.yuv.strideA = handle.strideA;
    }
  } else if (handle instanceof BiplanarYuvBuffer) {
    info.biYuv = {
      chromaWidth: handle.chromaWidth,
      chromaHeight: handle.chromaHeight,
      strideY: handle.strideY,
      strideUV: handle.strideUV,
    };
  }

  return info;
}
