export type AdmissionKeys = {
  limit: string;
  active: string;
  success: string;
  error: string;
};

export const ADMISSION_KEY_PATTERNS = ["dl_stats:*", "dl_active:*", "dl_limit:*"] as const;

export const admissionKeys = (source: string): AdmissionKeys => ({
  limit: `dl_limit:${source}`,
  active: `dl_active:${source}`,
  success: `dl_stats:${source}:success`,
  error: `dl_stats:${source}:error`
});

const ADMISSION_KEY = /^(?:dl_stats:(.+):(?:success|error)|dl_active:(.+)|dl_limit:(.+))$/;

export const sourceFromAdmissionKey = (key: string): string | undefined => {
  const match = ADMISSION_KEY.exec(key);
  return match ? match[1] ?? match[2] ?? match[3] : undefined;
};
