import type { KnowledgeGraph } from '@graphgate/shared/src/types/graph.types.js';
import { parseGraphDocument } from './graph/graph-store.js';

export const BATTLES = 'http://example.org/battles#';
export const RIVERS = 'http://example.org/rivers#';

export const BATTLES_TTL = `
@prefix wm: <${BATTLES}> .
@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .
@prefix xsd: <http://www.w3.org/2001/XMLSchema#> .

wm:BattleX a wm:Battle ;
  rdfs:label "BattleX" ;
  wm:hasCommander wm:GeneralY ;
  wm:startDate "1815-06-18"^^xsd:date .

wm:Battle_of_Foo a wm:Battle ;
  rdfs:label "Battle of Foo" ;
  wm:hasCommander wm:GeneralY .

wm:Battle_of_Zurich a wm:Battle ;
  rdfs:label "Battle of Zürich" ;
  wm:hasCommander wm:GeneralZ .

wm:GeneralY a wm:Agent ; rdfs:label "GeneralY" .
wm:GeneralZ a wm:Agent ; rdfs:label "GeneralZ" .
wm:Colonel_Q a wm:Agent ; rdfs:label "Colonel Q" .
`;

/**
 * Mississippi system: a main river with a tributary chain, a cycle between
 * Bear Creek and Whetstone River, and attribute literals for formatting.
 */
export const RIVERS_TTL = `
@prefix wm: <${RIVERS}> .
@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .
@prefix xsd: <http://www.w3.org/2001/XMLSchema#> .

wm:Mississippi_River a wm:River ;
  rdfs:label "Mississippi River" ;
  wm:length "3766000"^^xsd:double ;
  wm:discharge "16792"^^xsd:double ;
  wm:hasTributary wm:Missouri_River ;
  wm:hasMouth wm:Gulf_of_Mexico ;
  wm:traverses wm:Minnesota ;
  wm:abstractText "The Mississippi River is the second-longest river in North America." .

wm:Missouri_River a wm:River ;
  rdfs:label "Missouri River" ;
  wm:length "3767000"^^xsd:double ;
  wm:sourceElevation "1231.0"^^xsd:double ;
  wm:flowsInto wm:Mississippi_River ;
  wm:hasTributary wm:Yellowstone_River .

wm:Yellowstone_River a wm:River ;
  rdfs:label "Yellowstone River" ;
  wm:length "1114000"^^xsd:double .

wm:Gulf_of_Mexico a wm:Sea ; rdfs:label "Gulf of Mexico" .
wm:Minnesota a wm:State ; rdfs:label "Minnesota" ; wm:inCountry wm:United_States .

wm:Abrams_Creek_Tennessee a wm:River ;
  rdfs:label "Abrams Creek (Tennessee)" ;
  wm:length "800"^^xsd:double .

wm:Abrams_Creek_Ohio a wm:River ;
  rdfs:label "Abrams Creek (Ohio)" ;
  wm:length "950"^^xsd:double .

wm:Bear_Creek a wm:River ;
  rdfs:label "Bear Creek" ;
  wm:hasTributary wm:Whetstone_River .

wm:Whetstone_River a wm:River ;
  rdfs:label "Whetstone River" ;
  wm:flowsInto wm:Bear_Creek .
`;

export function graphFromTurtle(turtle: string): KnowledgeGraph {
  return parseGraphDocument(turtle);
}
