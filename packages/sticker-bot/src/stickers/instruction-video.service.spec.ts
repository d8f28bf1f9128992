import { Test, TestingModule } from "@nestjs/testing";
import { ConfigService } from "@nestjs/config";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { InputFile } from "grammy";
import { InstructionVideoService } from "./instruction-video.service";
import {
  INSTRUCTION_VIDEO_CAPTION,
  VIDEO_MISSING_TEXT,
  VIDEO_UNAVAILABLE_TEXT,
} from "./messages";

describe("InstructionVideoService", () => {
  let service: InstructionVideoService;
  let chat: { reply: jest.Mock; replyWithVideo: jest.Mock };
  let dir: string;
  let videoPath: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "instruction-video-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function createService(path: string): Promise<void> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        InstructionVideoService,
        {
          provide: ConfigService,
          useValue: { getOrThrow: jest.fn().mockReturnValue(path) },
        },
      ],
    }).compile();

    service = module.get<InstructionVideoService>(InstructionVideoService);
  }

  beforeEach(async () => {
    videoPath = join(dir, "instruction_video.mp4");
    await writeFile(videoPath, "not really a video");
    chat = {
      reply: jest.fn().mockResolvedValue(undefined),
      replyWithVideo: jest
        .fn()
        .mockResolvedValue({ video: { file_id: "cached-file-id" } }),
    };
    await createService(videoPath);
  });

  it("should upload the file and cache the returned file_id", async () => {
    await service.send(chat);

    expect(chat.replyWithVideo).toHaveBeenCalledWith(expect.any(InputFile), {
      caption: INSTRUCTION_VIDEO_CAPTION,
    });
    expect(service.getCachedFileId()).toBe("cached-file-id");
  });

  it("should reuse the cached file_id on later sends", async () => {
    await service.send(chat);
    await service.send(chat);

    expect(chat.replyWithVideo).toHaveBeenCalledTimes(2);
    expect(chat.replyWithVideo).toHaveBeenLastCalledWith("cached-file-id", {
      caption: INSTRUCTION_VIDEO_CAPTION,
    });
  });

  it("should re-upload when the cached file_id is rejected", async () => {
    await service.send(chat);
    chat.replyWithVideo
      .mockRejectedValueOnce(new Error("Bad Request: wrong file identifier"))
      .mockResolvedValueOnce({ video: { file_id: "fresh-file-id" } });

    await service.send(chat);

    expect(chat.replyWithVideo).toHaveBeenCalledTimes(3);
    expect(chat.replyWithVideo.mock.calls[2][0]).toBeInstanceOf(InputFile);
    expect(service.getCachedFileId()).toBe("fresh-file-id");
  });

  it("should reply with a fallback text when the file is missing", async () => {
    await createService(join(dir, "missing.mp4"));

    await service.send(chat);

    expect(chat.replyWithVideo).not.toHaveBeenCalled();
    expect(chat.reply).toHaveBeenCalledWith(VIDEO_MISSING_TEXT);
  });

  it("should report the video as unavailable when the upload fails", async () => {
    chat.replyWithVideo.mockRejectedValue(new Error("Request Entity Too Large"));

    await service.send(chat);

    expect(chat.reply).toHaveBeenCalledWith(VIDEO_UNAVAILABLE_TEXT);
    expect(service.getCachedFileId()).toBeNull();
  });
});
