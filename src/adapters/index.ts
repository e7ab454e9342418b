import { apollo247Adapter } from "./apollo247.js"
import { babymhospitalAdapter } from "./babymhospital.js"
import { curofyAdapter } from "./curofy.js"
import { drlogyAdapter } from "./drlogy.js"
import { healthfrogAdapter } from "./healthfrog.js"
import { patakareAdapter } from "./patakare.js"
import { PRACTO_INTERACTION, practoAdapter } from "./practo.js"
import { quickeralaAdapter } from "./quickerala.js"
import type { AdapterEntry } from "./types.js"

export const DEFAULT_ADAPTER_ENTRIES: readonly AdapterEntry[] = [
  { domainKey: "practo.com", strategy: "browser", adapter: practoAdapter, interaction: PRACTO_INTERACTION },
  { domainKey: "quickerala.com", strategy: "lightweight", adapter: quickeralaAdapter },
  { domainKey: "patakare.com", strategy: "lightweight", adapter: patakareAdapter },
  { domainKey: "drlogy.com", strategy: "lightweight", adapter: drlogyAdapter },
  { domainKey: "healthfrog.in", strategy: "lightweight", adapter: healthfrogAdapter },
  { domainKey: "apollo247.com", strategy: "lightweight", adapter: apollo247Adapter },
  { domainKey: "curofy.com", strategy: "lightweight", adapter: curofyAdapter },
  // Profiles on converse.rgcross.com embed the same serialized state as curofy.com
  { domainKey: "rgcross.com", strategy: "lightweight", adapter: curofyAdapter },
  { domainKey: "babymhospital.org", strategy: "browser", adapter: babymhospitalAdapter },
]

export type { AdapterEntry, ExtractedFields, FieldValue, SiteAdapter } from "./types.js"
