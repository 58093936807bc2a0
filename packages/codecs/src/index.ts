export { WktCodec } from "./wkt/WktCodec";
export { WkbCodec } from "./wkb/WkbCodec";
export { fromHex, toHex } from "./wkb/bytes";
export { MfJsonCodec } from "./mfjson/MfJsonCodec";
export { sridFromCrsName } from "./mfjson/schema";
export { toDecodeResult } from "./shared/result";
