export type Padding = "SAME" | "VALID";

export type WindowSpec = {
  /** Spatial input extent, [h, w]. */
  input: [number, number];
  /** Effective (dilated) kernel extent, [h, w]. */
  kernel: [number, number];
  stride: [number, number];
  padding: Padding;
};

export type WindowResult = {
  output: [number, number];
  /** [top, bottom, left, right] */
  pads: [number, number, number, number];
};

export function parsePadding(value: string | undefined): Padding | undefined {
  const normalized = value?.trim().toUpperCase();
  if (normalized === "SAME" || normalized === "VALID") {
    return normalized;
  }
  return undefined;
}

/** Extent covered by a kernel of size `k` at dilation `d`. */
export function dilatedExtent(kernel: number, dilation: number): number {
  return dilation * (kernel - 1) + 1;
}

function sameAxis(input: number, kernel: number, stride: number): [number, number, number] {
  const out = Math.ceil(input / stride);
  const total = Math.max((out - 1) * stride + kernel - input, 0);
  const before = Math.floor(total / 2);
  return [out, before, total - before];
}

function validAxis(input: number, kernel: number, stride: number): number {
  return Math.max(Math.ceil((input - kernel + 1) / stride), 0);
}

/**
 * Output spatial extent and padding of a conv / pool window.
 *
 * SAME: out = ceil(in / stride); the padding needed to cover the input,
 * max((out - 1) * stride + kernel - in, 0), is split floor / ceil between the
 * leading and trailing side.
 * VALID: out = ceil((in - kernel + 1) / stride), no padding.
 */
export function computeWindowedOutput(spec: WindowSpec): WindowResult {
  const [inH, inW] = spec.input;
  const [kH, kW] = spec.kernel;
  const [sH, sW] = spec.stride;
  if (spec.padding === "SAME") {
    const [outH, top, bottom] = sameAxis(inH, kH, sH);
    const [outW, left, right] = sameAxis(inW, kW, sW);
    return { output: [outH, outW], pads: [top, bottom, left, right] };
  }
  return {
    output: [validAxis(inH, kH, sH), validAxis(inW, kW, sW)],
    pads: [0, 0, 0, 0],
  };
}
