import { DocumentAttributes } from '../types/accountingDocument';

export const CANONICAL_HEADER = ['Názov', 'Účet MD', 'Účet Dal', 'Stred.', 'Zák.', 'Činn.'];

export const SAMPLE_ATTRIBUTES: DocumentAttributes = {
  documentNumber: '250901',
  documentDate: '30.09.2025',
  mandateId: '1',
  documentKind: 'ID mzdy',
  documentType: 'I',
  documentText: 'Mzdy 09/2025',
};

/**
 * Payroll export with a preamble, a group total, a bare total, an excluded row and a trailer
 */
export const EXPORT_CSV = [
  'Mzdový list;;;;;;;',
  'Obdobie: 09/2025;;;;;;;',
  ';;;;;;;',
  'Názov;Dátum;Účet MD;Účet Dal;Stred.;Zák.;Činn.;Poznámka',
  'Mzdy;;;;;;1 500,00;',
  ';30.09.2025;521 100;331;10;20;1 000,00;',
  ';;524;336;10;20;500,00;',
  ';;;;;;1 500,00;',
  'Výplata v hotovosti;;335;211;;;200,00;',
  'Stravné;;527;211;10;;80,50;',
  ';;;;;;;',
  'Vypracoval: J. Nováková;;;;;;;',
  'Schválil: M. Kováč;;;;;;;',
].join('\r\n');

export const EXPECTED_NORMALIZED_CSV =
  'Názov;Účet MD;Účet Dal;Stred.;Zák.;Činn.\r\n' +
  'Mzdy;521100;331;10;20;1000,00\r\n' +
  'Mzdy;524;336;10;20;500,00\r\n' +
  'Stravné;527;211;10;;80,50\r\n';

export const EXPECTED_XML = [
  '<?xml version="1.0"?>',
  '<uctovne_doklady>',
  '  <uctovny_doklad cislo_ud="250901" datum_ud="30.09.2025" mandant_id="1" druh_ud="ID mzdy" typ_ud="I" text_ud="Mzdy 09/2025">',
  '    <polozka_ud suma="1000.00" ucet="521100" strana="M" os="10" eo="20" text_pud="Mzdy"/>',
  '    <polozka_ud suma="500.00" ucet="524" strana="M" os="10" eo="20" text_pud="Mzdy"/>',
  '    <polozka_ud suma="80.50" ucet="527" strana="M" os="10" text_pud="Stravné"/>',
  '    <polozka_ud suma="1000.00" ucet="331" strana="D" os="10" eo="20" text_pud="Mzdy"/>',
  '    <polozka_ud suma="500.00" ucet="336" strana="D" os="10" eo="20" text_pud="Mzdy"/>',
  '    <polozka_ud suma="80.50" ucet="211" strana="D" os="10" text_pud="Stravné"/>',
  '  </uctovny_doklad>',
  '</uctovne_doklady>',
  '',
].join('\n');
