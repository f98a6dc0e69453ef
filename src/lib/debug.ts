// Trace output for funclet region decoding.
// Enable with FUNCLETS_DEBUG=1

const DEBUG =
  !!process.env.FUNCLETS_DEBUG && process.env.FUNCLETS_DEBUG !== "0";

export const logRegion = (msg: string) => {
  if (!DEBUG) return;
  // eslint-disable-next-line no-console
  console.error(`[funclets] ${msg}`);
};
