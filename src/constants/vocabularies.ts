/**
 * Centralized W3C and standard RDF/OWL/SKOS/DCMI vocabulary constants
 *
 * This file provides a single source of truth for the URIs the compiler asserts
 * or inspects, so string literals are not duplicated across modules.
 */

// ============================================================================
// RDF (Resource Description Framework)
// https://www.w3.org/1999/02/22-rdf-syntax-ns
// ============================================================================

export const RDF = {
  namespace: "http://www.w3.org/1999/02/22-rdf-syntax-ns#",
  type: "http://www.w3.org/1999/02/22-rdf-syntax-ns#type",
  Property: "http://www.w3.org/1999/02/22-rdf-syntax-ns#Property",
  first: "http://www.w3.org/1999/02/22-rdf-syntax-ns#first",
  rest: "http://www.w3.org/1999/02/22-rdf-syntax-ns#rest",
  nil: "http://www.w3.org/1999/02/22-rdf-syntax-ns#nil",
} as const;

// ============================================================================
// RDFS (RDF Schema)
// https://www.w3.org/2000/01/rdf-schema
// ============================================================================

export const RDFS = {
  namespace: "http://www.w3.org/2000/01/rdf-schema#",
  label: "http://www.w3.org/2000/01/rdf-schema#label",
  comment: "http://www.w3.org/2000/01/rdf-schema#comment",
  seeAlso: "http://www.w3.org/2000/01/rdf-schema#seeAlso",
  domain: "http://www.w3.org/2000/01/rdf-schema#domain",
  range: "http://www.w3.org/2000/01/rdf-schema#range",
  subClassOf: "http://www.w3.org/2000/01/rdf-schema#subClassOf",
  subPropertyOf: "http://www.w3.org/2000/01/rdf-schema#subPropertyOf",
  Class: "http://www.w3.org/2000/01/rdf-schema#Class",
  Resource: "http://www.w3.org/2000/01/rdf-schema#Resource",
  Literal: "http://www.w3.org/2000/01/rdf-schema#Literal",
} as const;

// ============================================================================
// OWL (Web Ontology Language)
// https://www.w3.org/2002/07/owl
// ============================================================================

export const OWL = {
  namespace: "http://www.w3.org/2002/07/owl#",
  Class: "http://www.w3.org/2002/07/owl#Class",
  ObjectProperty: "http://www.w3.org/2002/07/owl#ObjectProperty",
  DatatypeProperty: "http://www.w3.org/2002/07/owl#DatatypeProperty",
  AnnotationProperty: "http://www.w3.org/2002/07/owl#AnnotationProperty",
  SymmetricProperty: "http://www.w3.org/2002/07/owl#SymmetricProperty",
  AsymmetricProperty: "http://www.w3.org/2002/07/owl#AsymmetricProperty",
  TransitiveProperty: "http://www.w3.org/2002/07/owl#TransitiveProperty",
  ReflexiveProperty: "http://www.w3.org/2002/07/owl#ReflexiveProperty",
  IrreflexiveProperty: "http://www.w3.org/2002/07/owl#IrreflexiveProperty",
  InverseFunctionalProperty: "http://www.w3.org/2002/07/owl#InverseFunctionalProperty",
  DeprecatedClass: "http://www.w3.org/2002/07/owl#DeprecatedClass",
  DeprecatedProperty: "http://www.w3.org/2002/07/owl#DeprecatedProperty",
  Ontology: "http://www.w3.org/2002/07/owl#Ontology",
  unionOf: "http://www.w3.org/2002/07/owl#unionOf",
  deprecated: "http://www.w3.org/2002/07/owl#deprecated",
  versionIRI: "http://www.w3.org/2002/07/owl#versionIRI",
  versionInfo: "http://www.w3.org/2002/07/owl#versionInfo",
  priorVersion: "http://www.w3.org/2002/07/owl#priorVersion",
} as const;

// ============================================================================
// XSD (XML Schema Datatypes)
// https://www.w3.org/2001/XMLSchema
// ============================================================================

export const XSD = {
  namespace: "http://www.w3.org/2001/XMLSchema#",
  string: "http://www.w3.org/2001/XMLSchema#string",
  integer: "http://www.w3.org/2001/XMLSchema#integer",
  boolean: "http://www.w3.org/2001/XMLSchema#boolean",
  decimal: "http://www.w3.org/2001/XMLSchema#decimal",
  dateTime: "http://www.w3.org/2001/XMLSchema#dateTime",
  date: "http://www.w3.org/2001/XMLSchema#date",
} as const;

// ============================================================================
// SKOS (Simple Knowledge Organization System)
// https://www.w3.org/2004/02/skos/core
// ============================================================================

export const SKOS = {
  namespace: "http://www.w3.org/2004/02/skos/core#",
  exactMatch: "http://www.w3.org/2004/02/skos/core#exactMatch",
  closeMatch: "http://www.w3.org/2004/02/skos/core#closeMatch",
  broadMatch: "http://www.w3.org/2004/02/skos/core#broadMatch",
  narrowMatch: "http://www.w3.org/2004/02/skos/core#narrowMatch",
  relatedMatch: "http://www.w3.org/2004/02/skos/core#relatedMatch",
} as const;

// ============================================================================
// DCMI Metadata Terms
// http://purl.org/dc/terms/
// ============================================================================

export const DCTERMS = {
  namespace: "http://purl.org/dc/terms/",
  issued: "http://purl.org/dc/terms/issued",
  modified: "http://purl.org/dc/terms/modified",
  description: "http://purl.org/dc/terms/description",
  isReplacedBy: "http://purl.org/dc/terms/isReplacedBy",
} as const;

// ============================================================================
// Convenience exports for commonly used URIs
// ============================================================================

export const RDF_TYPE = RDF.type;
export const RDFS_LABEL = RDFS.label;
export const DCT_MODIFIED = DCTERMS.modified;
