/** Turns a finished result into prose. Output is commentary only and never feeds back into the metrics. */
export interface ResultAnnotator {
  annotate(subject: string, result: unknown): Promise<string>;
}

export type AnnotatedResult<T> = {
  subject: string;
  result: T;
  commentary: string | null;
  annotatorError: string | null;
};

export const annotateResult = async <T>(
  annotator: ResultAnnotator,
  subject: string,
  result: T,
): Promise<AnnotatedResult<T>> => {
  try {
    const commentary = await annotator.annotate(subject, result);
    return { subject, result, commentary, annotatorError: null };
  } catch (error) {
    return {
      subject,
      result,
      commentary: null,
      annotatorError: error instanceof Error ? error.message : String(error),
    };
  }
};
