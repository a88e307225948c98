import { SAMPLE_CONFIG } from "../../config";

export function sampleConfCommand(): number {
  console.log(JSON.stringify(SAMPLE_CONFIG, null, 2));
  return 0;
}
