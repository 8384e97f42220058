import { Test, TestingModule } from '@nestjs/testing';
import { NativeFilePickerAdapter } from './native-file-picker.adapter';
import { DialogProcessRunner } from './dialog-process.runner';
import { FilePickerError } from '../../../utils/errors/file-picker.error';

describe('NativeFilePickerAdapter', () => {
  let adapter: NativeFilePickerAdapter;
  const mockRunner = {
    run: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        NativeFilePickerAdapter,
        { provide: DialogProcessRunner, useValue: mockRunner },
      ],
    }).compile();

    adapter = module.get<NativeFilePickerAdapter>(NativeFilePickerAdapter);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should return the selected path without the trailing newline', async () => {
    mockRunner.run.mockResolvedValue({
      exitCode: 0,
      stdout: '/home/user/docs/report.pdf\n',
      stderr: '',
    });

    await expect(adapter.pickFile()).resolves.toBe(
      '/home/user/docs/report.pdf',
    );
    expect(mockRunner.run).toHaveBeenCalledTimes(1);
  });

  it('should return null when the dialog is cancelled', async () => {
    mockRunner.run.mockResolvedValue({ exitCode: 1, stdout: '', stderr: '' });

    await expect(adapter.pickFile()).resolves.toBeNull();
  });

  it('should return null when nothing was printed', async () => {
    mockRunner.run.mockResolvedValue({ exitCode: 0, stdout: '\r\n', stderr: '' });

    await expect(adapter.pickFile()).resolves.toBeNull();
  });

  it('should fail on any other exit code', async () => {
    mockRunner.run.mockResolvedValue({
      exitCode: 255,
      stdout: '',
      stderr: 'cannot open display\n',
    });

    const pick = adapter.pickFile();

    await expect(pick).rejects.toBeInstanceOf(FilePickerError);
    await expect(pick).rejects.toThrow(
      'exited with code 255: cannot open display',
    );
  });
});
