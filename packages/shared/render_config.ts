export interface FrameSize {
    width: number;
    height: number;
}

export interface CaptionStyle {
    fontName: string;
    fontSize: number;
    primaryColour: string; // &HAABBGGRR
    secondaryColour: string;
    outlineColour: string;
    backColour: string;
    borderStyle: number; // 1 = outline + drop shadow, 3 = opaque box
    outline: number;
    shadow: number;
    alignment: number; // numpad layout, 2 = bottom center
    marginL: number;
    marginR: number;
    marginV: number;
}

export interface RenderPreset {
    output: FrameSize;
    zoomInput: FrameSize; // zoompan works on a 2x upscale to avoid blur
    fps: number;
    intensity: number;
    maxZoomSpan: number; // max zoom = 1 + maxZoomSpan * intensity
    captionMaxWidth: number; // in wide-character units
    captionLinesPerPage: number;
    caption: CaptionStyle;
    video: {
        codec: string;
        preset: string;
        crf: number;
    };
    audio: {
        codec: string;
        bitrate: string;
    };
}

// 1080 wide, 60px margins each side, 70px font: 960 / 70 ~= 13.7 wide chars per line
export const VERTICAL_1080P: RenderPreset = {
    output: { width: 1080, height: 1920 },
    zoomInput: { width: 2160, height: 3840 },
    fps: 25,
    intensity: 0.3,
    maxZoomSpan: 0.5,
    captionMaxWidth: 13,
    captionLinesPerPage: 2,
    caption: {
        fontName: 'Arial Unicode MS',
        fontSize: 70,
        primaryColour: '&H00FFFFFF',
        secondaryColour: '&H000000FF',
        // BorderStyle 3 draws an opaque box filled with the outline colour: 50% black here
        outlineColour: '&H80000000',
        backColour: '&H80000000',
        borderStyle: 3,
        outline: 2,
        shadow: 2,
        alignment: 2,
        marginL: 60,
        marginR: 60,
        marginV: 350
    },
    video: {
        codec: 'libx264',
        preset: 'fast',
        crf: 22
    },
    audio: {
        codec: 'aac',
        bitrate: '128k'
    }
};
