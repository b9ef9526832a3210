import { EbscoLinter } from '../platforms/ebsco/EbscoLinter.js';
import { EbscoParser } from '../platforms/ebsco/EbscoParser.js';
import { EbscoSerializer } from '../platforms/ebsco/EbscoSerializer.js';
import { EBSCO_SYNTAX } from '../platforms/ebsco/syntax.js';
import { GenericLinter } from '../platforms/generic/GenericLinter.js';
import { GenericSerializer } from '../platforms/generic/GenericSerializer.js';
import { GenericTranslator } from '../platforms/generic/GenericTranslator.js';
import { GENERIC_SYNTAX } from '../platforms/generic/syntax.js';
import { PubmedLinter } from '../platforms/pubmed/PubmedLinter.js';
import { PubmedParser } from '../platforms/pubmed/PubmedParser.js';
import { PubmedSerializer } from '../platforms/pubmed/PubmedSerializer.js';
import { PubmedTranslator } from '../platforms/pubmed/PubmedTranslator.js';
import { PUBMED_SYNTAX } from '../platforms/pubmed/syntax.js';
import { WOS_SYNTAX, WOS_V0_SYNTAX } from '../platforms/wos/syntax.js';
import { WosLinter } from '../platforms/wos/WosLinter.js';
import { WosParser } from '../platforms/wos/WosParser.js';
import { WosSerializer } from '../platforms/wos/WosSerializer.js';
import { QueryTranslator } from '../translator/QueryTranslator.js';
import { RegistryBuilder, VersionRegistry } from './VersionRegistry.js';

export function createDefaultRegistry(): VersionRegistry {
  return (
    new RegistryBuilder()
      // PubMed
      .registerLinter(PUBMED_SYNTAX, (options) => new PubmedLinter(options))
      .registerParser('pubmed', PUBMED_SYNTAX.version, (query, options) => new PubmedParser(query, options))
      .registerTranslator('pubmed', PUBMED_SYNTAX.version, () => new PubmedTranslator())
      .registerSerializer('pubmed', PUBMED_SYNTAX.version, () => new PubmedSerializer())
      // Web of Science, legacy tags
      .registerLinter(WOS_V0_SYNTAX, (options) => new WosLinter(options, WOS_V0_SYNTAX))
      .registerParser('wos', WOS_V0_SYNTAX.version, (query, options) => new WosParser(query, options, WOS_V0_SYNTAX))
      .registerTranslator('wos', WOS_V0_SYNTAX.version, () => new QueryTranslator(WOS_V0_SYNTAX))
      .registerSerializer('wos', WOS_V0_SYNTAX.version, () => new WosSerializer(WOS_V0_SYNTAX))
      // Web of Science
      .registerLinter(WOS_SYNTAX, (options) => new WosLinter(options))
      .registerParser('wos', WOS_SYNTAX.version, (query, options) => new WosParser(query, options))
      .registerTranslator('wos', WOS_SYNTAX.version, () => new QueryTranslator(WOS_SYNTAX))
      .registerSerializer('wos', WOS_SYNTAX.version, () => new WosSerializer())
      // EBSCOHost
      .registerLinter(EBSCO_SYNTAX, (options) => new EbscoLinter(options))
      .registerParser('ebsco', EBSCO_SYNTAX.version, (query, options) => new EbscoParser(query, options))
      .registerTranslator('ebsco', EBSCO_SYNTAX.version, () => new QueryTranslator(EBSCO_SYNTAX))
      .registerSerializer('ebsco', EBSCO_SYNTAX.version, () => new EbscoSerializer())
      // Generic intermediate representation: built programmatically, never parsed
      .registerLinter(GENERIC_SYNTAX, (options) => new GenericLinter(options))
      .registerTranslator('generic', GENERIC_SYNTAX.version, () => new GenericTranslator())
      .registerSerializer('generic', GENERIC_SYNTAX.version, () => new GenericSerializer())
      .build()
  );
}

/** Registry used by the public API */
export const registry = createDefaultRegistry();
