/**
 * Button custom ids look like `MJ::JOB::upsample::1::<hash>`; the hash is the
 * last segment.
 */
export const extractImageHash = (customId: string): string => {
  const segments = customId.split("::");
  return segments[segments.length - 1] ?? "";
};

export const buildActionCustomId = (action: "upsample" | "variation", index: number, messageHash: string): string =>
  `MJ::JOB::${action}::${index}::${messageHash}`;
