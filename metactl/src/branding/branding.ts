export const PACKAGE_NAME = "metactl";
export const PACKAGE_VERSION = "0.1.0";

export type Branding = {
  /** Sent as the `User-Agent` of every request. */
  headerValue: string;
  /** Placeholder written into loader metadata where consumers substitute the game version. */
  dummyReplaceString: string;
};

export function createBranding(name: string, email: string): Branding {
  return {
    headerValue: `${name}/${PACKAGE_NAME}/${PACKAGE_VERSION} <${email}>`,
    dummyReplaceString: "${" + name + ".gameVersion}",
  };
}

export const DEFAULT_BRANDING: Branding = createBranding("unbranded", "unbranded");

export type SetOnceResult = { ok: true } | { ok: false; error: "ALREADY_SET" };

/** A cell that accepts exactly one value; later writes are reported, not applied. */
export class WriteOnce<T> {
  private slot: { value: T } | undefined;

  set(value: T): SetOnceResult {
    if (this.slot) return { ok: false, error: "ALREADY_SET" };
    this.slot = { value };
    return { ok: true };
  }

  get(): T | undefined {
    return this.slot?.value;
  }

  isSet(): boolean {
    return this.slot !== undefined;
  }
}

export type SetBrandingResult = { ok: true } | { ok: false; error: "BRANDING_ALREADY_SET" };

const BRANDING = new WriteOnce<Branding>();

/** Configure the process-wide branding. The first call wins. */
export function setBranding(branding: Branding): SetBrandingResult {
  const res = BRANDING.set(branding);
  return res.ok ? res : { ok: false, error: "BRANDING_ALREADY_SET" };
}

/** Configured branding, or {@link DEFAULT_BRANDING}. Reading never locks in the default. */
export function currentBranding(): Branding {
  return BRANDING.get() ?? DEFAULT_BRANDING;
}
