import { ClassificationPipeline } from "./classify/pipeline";
import { getClassifierConfig } from "./config";
import { getLinguisticServices } from "./nlp";

let pipelinePromise: Promise<ClassificationPipeline> | null = null;

/** Process-wide pipeline over the default linguistic services and env config. */
export function getDefaultPipeline(): Promise<ClassificationPipeline> {
  if (!pipelinePromise) {
    pipelinePromise = getLinguisticServices().then((services) => new ClassificationPipeline(services, getClassifierConfig()));
    pipelinePromise.catch(() => {
      pipelinePromise = null;
    });
  }
  return pipelinePromise;
}
