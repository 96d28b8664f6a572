export interface SegmentRenderRequest {
    slideIndex: number;
    imagePath: string;
    audioPath: string;
    duration: number; // seconds
    filter: string; // complete -vf graph
    outputPath: string;
}

/** Everything the assembler needs from the outside world, behind one seam. */
export interface MediaToolkit {
    download(url: string, destination: string, slideIndex: number): Promise<void>;
    /** Rejects with DurationProbeError when the duration cannot be measured. */
    probeDuration(file: string): Promise<number>;
    /** Rejects with RenderInvocationError on a non-zero exit or timeout. */
    renderSegment(request: SegmentRenderRequest): Promise<void>;
    concat(segments: readonly string[], outputPath: string): Promise<void>;
}
