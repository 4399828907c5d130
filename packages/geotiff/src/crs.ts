import { TiffTag, TiffTagGeo } from "@cogeotiff/core";
import { CrsUnavailableError, FormatError } from "./errors.js";
import type { CogDocument, GeoKeyEntry } from "./ifd.js";

// ── PROJJSON types ────────────────────────────────────────────────────────────
// Subset of PROJJSON covering the two CRS types we emit.
// https://proj.org/en/stable/specifications/projjson.html

export interface ProjJsonUnit {
  type: "LinearUnit" | "AngularUnit";
  name: string;
  conversion_factor: number;
}

export type ProjJsonUnitRef = string | ProjJsonUnit;

export interface ProjJsonAxis {
  name: string;
  abbreviation: string;
  direction: string;
  unit: ProjJsonUnitRef;
}

export interface ProjJsonCoordinateSystem {
  subtype: string;
  axis: ProjJsonAxis[];
}

export interface ProjJsonEllipsoid {
  name: string;
  semi_major_axis?: number;
  semi_minor_axis?: number;
  inverse_flattening?: number;
}

export interface ProjJsonDatum {
  type: "GeodeticReferenceFrame";
  name: string;
  ellipsoid?: ProjJsonEllipsoid;
  prime_meridian?: { name: string; longitude: number };
}

export interface ProjJsonParameter {
  name: string;
  value: number;
  unit: ProjJsonUnitRef;
}

export interface ProjJsonConversion {
  name: string;
  method: { name: string };
  parameters: ProjJsonParameter[];
}

export interface GeographicCRS {
  type: "GeographicCRS";
  $schema?: string;
  name: string;
  datum: ProjJsonDatum;
  coordinate_system: ProjJsonCoordinateSystem;
}

export interface ProjectedCRS {
  type: "ProjectedCRS";
  $schema: string;
  name: string;
  base_crs: GeographicCRS;
  conversion: ProjJsonConversion;
  coordinate_system: ProjJsonCoordinateSystem;
}

export type ProjJson = GeographicCRS | ProjectedCRS;

// ── GeoKey resolution ────────────────────────────────────────────────────────

/** A resolved GeoKey value: a SHORT, DOUBLE(s), or an ASCII string. */
export type GeoKeyValue = number | number[] | string;

/**
 * Resolved GeoKeys of one file, looked up by `TiffTagGeo` id.
 */
export class GeoKeys {
  constructor(readonly values: ReadonlyMap<number, GeoKeyValue>) {}

  /** Numeric value of a key; null when absent or not numeric. */
  number(key: TiffTagGeo): number | null {
    const value = this.values.get(key);
    if (typeof value === "number") {
      return value;
    }
    if (Array.isArray(value) && value.length > 0) {
      return value[0] ?? null;
    }
    return null;
  }

  /** String value of a key; null when absent or not a string. */
  string(key: TiffTagGeo): string | null {
    const value = this.values.get(key);
    return typeof value === "string" ? value : null;
  }

  /** First present numeric value among `keys`. */
  firstNumber(keys: readonly TiffTagGeo[]): number | null {
    for (const key of keys) {
      const value = this.number(key);
      if (value !== null) {
        return value;
      }
    }
    return null;
  }
}

/**
 * Resolve raw GeoKey entries against the parameter arrays.
 *
 * Location 0 holds the value inline; GeoDoubleParams and GeoAsciiParams are
 * indexed by offset and count. ASCII values drop their `|` terminator.
 */
export function resolveGeoKeys(
  entries: readonly GeoKeyEntry[],
  doubleParams: readonly number[] | null,
  asciiParams: string | null,
): GeoKeys {
  const values = new Map<number, GeoKeyValue>();

  for (const entry of entries) {
    const { keyId, location, count, valueOffset } = entry;
    const end = valueOffset + count;

    switch (location) {
      case 0:
        values.set(keyId, valueOffset);
        break;
      case TiffTag.GeoDoubleParams: {
        if (doubleParams === null || end > doubleParams.length) {
          throw new FormatError(
            "GeoDoubleParams",
            `key ${keyId} references values ${valueOffset}..${end} outside the array`,
          );
        }
        const slice = doubleParams.slice(valueOffset, end);
        values.set(keyId, slice.length === 1 ? (slice[0] ?? 0) : slice);
        break;
      }
      case TiffTag.GeoAsciiParams: {
        if (asciiParams === null || end > asciiParams.length) {
          throw new FormatError(
            "GeoAsciiParams",
            `key ${keyId} references characters ${valueOffset}..${end} outside the string`,
          );
        }
        values.set(keyId, asciiParams.slice(valueOffset, end).replace(/\|$/, ""));
        break;
      }
      default:
        // Values stored in other tags (e.g. inside the directory itself) are
        // not used by the CRS builder.
        break;
    }
  }

  return new GeoKeys(values);
}

/**
 * CRS descriptor of a parsed file: `"EPSG:<code>"` for coded CRSes, else the
 * PROJJSON text built from the GeoKeys.
 */
export function resolveCrs(document: CogDocument): string {
  if (document.geoDoubleParams === null || document.geoAsciiParams === null) {
    throw new CrsUnavailableError(
      "file carries no GeoDoubleParams/GeoAsciiParams to build a CRS from",
    );
  }

  const keys = resolveGeoKeys(
    document.geoKeys,
    document.geoDoubleParams,
    document.geoAsciiParams,
  );
  const crs = crsFromGeoKeys(keys);
  return typeof crs === "number" ? `EPSG:${crs}` : JSON.stringify(crs);
}

// ── CRS building ─────────────────────────────────────────────────────────────

const PROJJSON_SCHEMA = "https://proj.org/schemas/v0.7/projjson.schema.json";

const MODEL_TYPE_PROJECTED = 1;
const MODEL_TYPE_GEOGRAPHIC = 2;
const USER_DEFINED = 32767;

const ANGULAR_UNITS: Record<number, string> = {
  9101: "radian",
  9102: "degree",
  9105: "grad",
};

const LINEAR_UNITS: Record<number, ProjJsonUnitRef> = {
  9001: "metre",
  9002: "foot",
  9003: {
    type: "LinearUnit",
    name: "US survey foot",
    conversion_factor: 0.30480060960121924,
  },
};

/**
 * Interpret GeoKeys as a CRS.
 *
 * Returns the EPSG code for EPSG-coded CRSes, or a PROJJSON object for
 * user-defined ones.
 */
export function crsFromGeoKeys(keys: GeoKeys): number | ProjJson {
  const modelType = keys.number(TiffTagGeo.GTModelTypeGeoKey);

  switch (modelType) {
    case MODEL_TYPE_PROJECTED: {
      const epsg = keys.number(TiffTagGeo.ProjectedCRSGeoKey);
      if (epsg !== null && epsg !== USER_DEFINED) {
        return epsg;
      }
      return buildProjectedCrs(keys);
    }
    case MODEL_TYPE_GEOGRAPHIC: {
      const epsg = keys.number(TiffTagGeo.GeodeticCRSGeoKey);
      if (epsg !== null && epsg !== USER_DEFINED) {
        return epsg;
      }
      return { $schema: PROJJSON_SCHEMA, ...buildGeographicCrs(keys) };
    }
    default:
      throw new CrsUnavailableError(`unsupported GeoTIFF model type: ${modelType}`);
  }
}

function isCoded(value: number | null): value is number {
  return value !== null && value !== USER_DEFINED;
}

function buildGeographicCrs(keys: GeoKeys): GeographicCRS {
  const citation = keys.string(TiffTagGeo.GeodeticCitationGeoKey) ?? "User-defined";
  const datumCode = keys.number(TiffTagGeo.GeodeticDatumGeoKey);

  const datum: ProjJsonDatum = isCoded(datumCode)
    ? {
        type: "GeodeticReferenceFrame",
        name: `Unknown datum based upon EPSG ${datumCode} ellipsoid`,
      }
    : {
        type: "GeodeticReferenceFrame",
        name: citation,
        ellipsoid: buildEllipsoid(keys, citation),
        prime_meridian: primeMeridian(keys),
      };

  const unit =
    ANGULAR_UNITS[keys.number(TiffTagGeo.GeogAngularUnitsGeoKey) ?? 9102] ?? "degree";

  return {
    type: "GeographicCRS",
    name: citation,
    datum,
    coordinate_system: {
      subtype: "ellipsoidal",
      axis: [
        { name: "Geodetic latitude", abbreviation: "Lat", direction: "north", unit },
        { name: "Geodetic longitude", abbreviation: "Lon", direction: "east", unit },
      ],
    },
  };
}

function primeMeridian(keys: GeoKeys): { name: string; longitude: number } {
  const code = keys.number(TiffTagGeo.PrimeMeridianGeoKey);
  if (isCoded(code)) {
    return { name: `EPSG:${code}`, longitude: 0 };
  }
  const longitude = keys.number(TiffTagGeo.PrimeMeridianLongitudeGeoKey);
  if (longitude !== null) {
    return { name: "User-defined", longitude };
  }
  return { name: "Greenwich", longitude: 0 };
}

function buildEllipsoid(keys: GeoKeys, citation: string): ProjJsonEllipsoid {
  const code = keys.number(TiffTagGeo.EllipsoidGeoKey);
  const semiMajor = keys.number(TiffTagGeo.EllipsoidSemiMajorAxisGeoKey);
  const invFlattening = keys.number(TiffTagGeo.EllipsoidInvFlatteningGeoKey);
  const semiMinor = keys.number(TiffTagGeo.EllipsoidSemiMinorAxisGeoKey);

  const ellipsoid: ProjJsonEllipsoid = {
    name: isCoded(code) ? `EPSG ellipsoid ${code}` : citation,
  };
  if (semiMajor !== null) {
    ellipsoid.semi_major_axis = semiMajor;
  } else if (!isCoded(code)) {
    throw new CrsUnavailableError(
      "user-defined ellipsoid requires EllipsoidSemiMajorAxisGeoKey",
    );
  }

  if (invFlattening !== null) {
    ellipsoid.inverse_flattening = invFlattening;
  } else if (semiMinor !== null) {
    ellipsoid.semi_minor_axis = semiMinor;
  } else if (!isCoded(code)) {
    throw new CrsUnavailableError(
      "user-defined ellipsoid requires EllipsoidInvFlatteningGeoKey or EllipsoidSemiMinorAxisGeoKey",
    );
  }

  return ellipsoid;
}

function buildProjectedCrs(keys: GeoKeys): ProjectedCRS {
  const unit =
    LINEAR_UNITS[keys.number(TiffTagGeo.ProjLinearUnitsGeoKey) ?? 9001] ?? "metre";

  return {
    type: "ProjectedCRS",
    $schema: PROJJSON_SCHEMA,
    name:
      keys.string(TiffTagGeo.ProjectedCitationGeoKey) ??
      keys.string(TiffTagGeo.GTCitationGeoKey) ??
      "User-defined",
    // The geodetic EPSG code inside a user-defined projected CRS is
    // informational; the base CRS is always built from the keys.
    base_crs: buildGeographicCrs(keys),
    conversion: buildConversion(keys),
    coordinate_system: {
      subtype: "Cartesian",
      axis: [
        { name: "Easting", abbreviation: "E", direction: "east", unit },
        { name: "Northing", abbreviation: "N", direction: "north", unit },
      ],
    },
  };
}

// ── Conversions ──────────────────────────────────────────────────────────────

type ParameterKind = "angular" | "linear" | "scale";

/** A conversion parameter and the keys that may carry it, in priority order. */
type ParameterSpec = [name: string, kind: ParameterKind, keys: TiffTagGeo[]];

type MethodSpec = { name: string; parameters: ParameterSpec[] };

const PARAMETER_UNITS: Record<ParameterKind, { unit: string; fallback: number }> = {
  angular: { unit: "degree", fallback: 0 },
  linear: { unit: "metre", fallback: 0 },
  scale: { unit: "unity", fallback: 1 },
};

const G = TiffTagGeo;

const FALSE_EASTING: ParameterSpec = ["False easting", "linear", [G.ProjFalseEastingGeoKey]];
const FALSE_NORTHING: ParameterSpec = ["False northing", "linear", [G.ProjFalseNorthingGeoKey]];

const NATURAL_ORIGIN: ParameterSpec[] = [
  ["Latitude of natural origin", "angular", [G.ProjNatOriginLatGeoKey]],
  ["Longitude of natural origin", "angular", [G.ProjNatOriginLongGeoKey]],
];

const CENTER_ORIGIN: ParameterSpec[] = [
  ["Latitude of natural origin", "angular", [G.ProjCenterLatGeoKey]],
  ["Longitude of natural origin", "angular", [G.ProjCenterLongGeoKey]],
];

const NATURAL_ORIGIN_SCALED: ParameterSpec[] = [
  ...NATURAL_ORIGIN,
  ["Scale factor at natural origin", "scale", [G.ProjScaleAtNatOriginGeoKey]],
  FALSE_EASTING,
  FALSE_NORTHING,
];

const CENTER_ORIGIN_SCALED: ParameterSpec[] = [
  ...CENTER_ORIGIN,
  ["Scale factor at natural origin", "scale", [G.ProjScaleAtCenterGeoKey]],
  FALSE_EASTING,
  FALSE_NORTHING,
];

const FALSE_ORIGIN_TWO_PARALLELS: ParameterSpec[] = [
  ["Latitude of false origin", "angular", [G.ProjFalseOriginLatGeoKey, G.ProjNatOriginLatGeoKey]],
  ["Longitude of false origin", "angular", [G.ProjFalseOriginLongGeoKey, G.ProjNatOriginLongGeoKey]],
  ["Latitude of 1st standard parallel", "angular", [G.ProjStdParallel1GeoKey]],
  ["Latitude of 2nd standard parallel", "angular", [G.ProjStdParallel2GeoKey]],
  ["Easting at false origin", "linear", [G.ProjFalseOriginEastingGeoKey, G.ProjFalseEastingGeoKey]],
  ["Northing at false origin", "linear", [G.ProjFalseOriginNorthingGeoKey, G.ProjFalseNorthingGeoKey]],
];

const HOTINE_OBLIQUE_MERCATOR: MethodSpec = {
  name: "Hotine Oblique Mercator (variant B)",
  parameters: [
    ["Latitude of projection centre", "angular", [G.ProjCenterLatGeoKey]],
    ["Longitude of projection centre", "angular", [G.ProjCenterLongGeoKey]],
    ["Azimuth of initial line", "angular", [G.ProjAzimuthAngleGeoKey]],
    ["Angle from Rectified to Skew Grid", "angular", [G.ProjAzimuthAngleGeoKey]],
    ["Scale factor on initial line", "scale", [G.ProjScaleAtCenterGeoKey]],
    ["Easting at projection centre", "linear", [G.ProjCenterEastingGeoKey]],
    ["Northing at projection centre", "linear", [G.ProjCenterNorthingGeoKey]],
  ],
};

const TRANSVERSE_MERCATOR_SOUTH: MethodSpec = {
  name: "Transverse Mercator (South Orientated)",
  parameters: NATURAL_ORIGIN_SCALED,
};

/**
 * Coordinate transformation codes (ProjMethodGeoKey) and their PROJJSON
 * methods.
 */
const METHODS: Record<number, MethodSpec> = {
  1: { name: "Transverse Mercator", parameters: NATURAL_ORIGIN_SCALED },
  2: TRANSVERSE_MERCATOR_SOUTH,
  3: HOTINE_OBLIQUE_MERCATOR,
  4: HOTINE_OBLIQUE_MERCATOR,
  5: HOTINE_OBLIQUE_MERCATOR,
  6: HOTINE_OBLIQUE_MERCATOR,
  7: { name: "Mercator (variant A)", parameters: NATURAL_ORIGIN_SCALED },
  8: { name: "Lambert Conic Conformal (2SP)", parameters: FALSE_ORIGIN_TWO_PARALLELS },
  9: { name: "Lambert Conic Conformal (1SP)", parameters: NATURAL_ORIGIN_SCALED },
  10: {
    name: "Lambert Azimuthal Equal Area",
    parameters: [...CENTER_ORIGIN, FALSE_EASTING, FALSE_NORTHING],
  },
  11: { name: "Albers Equal Area", parameters: FALSE_ORIGIN_TWO_PARALLELS },
  12: {
    name: "Modified Azimuthal Equidistant",
    parameters: [...CENTER_ORIGIN, FALSE_EASTING, FALSE_NORTHING],
  },
  14: { name: "Stereographic", parameters: CENTER_ORIGIN_SCALED },
  15: {
    name: "Polar Stereographic (variant B)",
    parameters: [
      ["Latitude of standard parallel", "angular", [G.ProjNatOriginLatGeoKey, G.ProjStdParallel1GeoKey]],
      ["Longitude of origin", "angular", [G.ProjStraightVertPoleLongGeoKey, G.ProjNatOriginLongGeoKey]],
      FALSE_EASTING,
      FALSE_NORTHING,
    ],
  },
  16: { name: "Oblique Stereographic", parameters: CENTER_ORIGIN_SCALED },
  17: {
    name: "Equidistant Cylindrical",
    parameters: [
      ["Latitude of 1st standard parallel", "angular", [G.ProjStdParallel1GeoKey, G.ProjCenterLatGeoKey]],
      ["Longitude of natural origin", "angular", [G.ProjCenterLongGeoKey]],
      FALSE_EASTING,
      FALSE_NORTHING,
    ],
  },
  18: { name: "Cassini-Soldner", parameters: [...NATURAL_ORIGIN, FALSE_EASTING, FALSE_NORTHING] },
  21: { name: "Orthographic", parameters: [...CENTER_ORIGIN, FALSE_EASTING, FALSE_NORTHING] },
  22: { name: "American Polyconic", parameters: [...NATURAL_ORIGIN, FALSE_EASTING, FALSE_NORTHING] },
  24: {
    name: "Sinusoidal",
    parameters: [
      ["Longitude of natural origin", "angular", [G.ProjCenterLongGeoKey]],
      FALSE_EASTING,
      FALSE_NORTHING,
    ],
  },
  26: { name: "New Zealand Map Grid", parameters: [...NATURAL_ORIGIN, FALSE_EASTING, FALSE_NORTHING] },
  27: TRANSVERSE_MERCATOR_SOUTH,
};

function buildConversion(keys: GeoKeys): ProjJsonConversion {
  const code = keys.number(TiffTagGeo.ProjMethodGeoKey);
  if (code === null) {
    throw new CrsUnavailableError("user-defined projected CRS requires ProjMethodGeoKey");
  }
  const method = METHODS[code];
  if (method === undefined) {
    throw new CrsUnavailableError(`unsupported coordinate transformation type: ${code}`);
  }

  return {
    name: method.name,
    method: { name: method.name },
    parameters: method.parameters.map(([name, kind, sources]) => {
      const { unit, fallback } = PARAMETER_UNITS[kind];
      return { name, value: keys.firstNumber(sources) ?? fallback, unit };
    }),
  };
}
