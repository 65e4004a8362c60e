export const RELIABLE_ARTICLE =
  "Scientists at Harvard University published research in Nature journal showing climate change effects on coastal regions. The study, conducted over 5 years, analyzed data from 50 locations worldwide.";

export const FAKE_ARTICLE =
  "SHOCKING!!! You won't believe what they discovered! This one secret that THEY don't want you to know will change EVERYTHING! Click here now before it's too late!!!";

export const MIXED_ARTICLE =
  "According to a report released by the World Health Organization on January 15, 2024, vaccination rates have increased by 12% globally compared to last year.";
