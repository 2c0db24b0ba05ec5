import { registerScraper } from "../registry";
import { bielefeldJetztScraper } from "./bielefeldjetzt";
import { bielefeldMarketingScraper } from "./bielefeldmarketing";
import { owlJournalScraper } from "./owljournal";
import { kulturamtScraper } from "./kulturamt";
import { stereoScraper } from "./stereo";
import { bunkerUlmenwallScraper } from "./bunkerulmenwall";
import { buoScraper } from "./buo";
import { lokschuppenScraper } from "./lokschuppen";
import { nrzpScraper } from "./nrzp";
import { primeScraper } from "./prime";
import { nwEventsScraper } from "./nwevents";

export function registerAllScrapers(): void {
  registerScraper(bielefeldJetztScraper);
  registerScraper(bielefeldMarketingScraper);
  registerScraper(owlJournalScraper);
  registerScraper(kulturamtScraper);
  registerScraper(stereoScraper);
  registerScraper(bunkerUlmenwallScraper);
  registerScraper(buoScraper);
  registerScraper(lokschuppenScraper);
  registerScraper(nrzpScraper);
  registerScraper(primeScraper);
  registerScraper(nwEventsScraper);
}

export {
  bielefeldJetztScraper,
  bielefeldMarketingScraper,
  owlJournalScraper,
  kulturamtScraper,
  stereoScraper,
  bunkerUlmenwallScraper,
  buoScraper,
  lokschuppenScraper,
  nrzpScraper,
  primeScraper,
  nwEventsScraper,
};
