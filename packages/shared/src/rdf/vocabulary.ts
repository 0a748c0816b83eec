export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';
export const XSD_NS = 'http://www.w3.org/2001/XMLSchema#';

export const RDF_TYPE = `${RDF_NS}type`;
export const RDF_LANG_STRING = `${RDF_NS}langString`;
export const RDFS_LABEL = `${RDFS_NS}label`;

export const XSD = {
  string: `${XSD_NS}string`,
  date: `${XSD_NS}date`,
  dateTime: `${XSD_NS}dateTime`,
  double: `${XSD_NS}double`,
  decimal: `${XSD_NS}decimal`,
  integer: `${XSD_NS}integer`,
  float: `${XSD_NS}float`,
  gYear: `${XSD_NS}gYear`,
} as const;

export const NUMERIC_DATATYPES: ReadonlySet<string> = new Set([
  XSD.double,
  XSD.decimal,
  XSD.integer,
  XSD.float,
]);
