export {
  buildExifTagMap,
  dmsToDecimal,
  extractExifFields,
  gpsCoordinates,
  EXIF_HEADERS,
  type Coordinates,
  type ExifNamespace,
  type ExifTag,
  type ExifTagMap,
  type RawExif,
} from "./exif.js";

// the decoder itself is loaded on demand; it pulls in the native image stack
export type { PhotoDecoder } from "./photo-decoder.js";
export { md5File } from "./checksum.js";

export {
  createHttpGeolocationClient,
  DEFAULT_GEO_ENDPOINT,
  type GeoMeta,
  type GeolocationClient,
  type HttpGeolocationOptions,
} from "./geolocation.js";

export {
  formatCountry,
  languageName,
  lookupCountry,
  type CountryCodes,
} from "./codes.js";
