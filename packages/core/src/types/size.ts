/**
 * Layout size in CSS pixels, as reported by the host's text layout.
 */
export interface Size {
  width: number;
  height: number;
}

export const ZERO_SIZE: Readonly<Size> = Object.freeze({ width: 0, height: 0 });
