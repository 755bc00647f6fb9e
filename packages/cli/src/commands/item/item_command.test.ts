/**
 * Item Command tests
 */

// Mock DependencyInjectionService
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import * as fs from 'fs';
import { Command } from 'commander';
import { ItemCommand } from './item_command';
import { DependencyInjectionService } from '../../services/dependency-injection';

const addResult = {
  descriptor: {
    filename: 'bob/x.json',
    itemType: 'product',
    changeKind: 'Add',
    user: 'bob',
    isDataOwner: false,
  },
  receipt: {
    branch: 'add-bob-x-json',
    pullRequest: { number: 7, url: 'https://github.com/test-org/catalog/pull/7' },
  },
};

// Mock console and process.exit at module level
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

describe('ItemCommand', () => {
  let itemCommand: ItemCommand;
  let mockReadFile: jest.SpyInstance;
  let mockService: {
    addItem: jest.Mock;
    updateItem: jest.Mock;
    deleteItem: jest.Mock;
    listSubmissions: jest.Mock;
  };
  let mockDependencyService: {
    setLogLevel: jest.Mock;
    getItemSubmissionService: jest.Mock;
  };

  beforeEach(() => {
    jest.clearAllMocks();

    mockReadFile = jest.spyOn(fs.promises, 'readFile').mockResolvedValue(Buffer.from('{}'));

    mockService = {
      addItem: jest.fn().mockResolvedValue(addResult),
      updateItem: jest.fn().mockResolvedValue({
        ...addResult,
        descriptor: { ...addResult.descriptor, changeKind: 'Update' },
      }),
      deleteItem: jest.fn().mockResolvedValue({
        ...addResult,
        descriptor: { ...addResult.descriptor, changeKind: 'Delete' },
      }),
      listSubmissions: jest.fn(),
    };

    mockDependencyService = {
      setLogLevel: jest.fn(),
      getItemSubmissionService: jest.fn().mockResolvedValue(mockService),
    };

    // Set up mock BEFORE constructing command (BaseCommand reads DI on construction)
    (DependencyInjectionService.getInstance as jest.MockedFunction<typeof DependencyInjectionService.getInstance>)
      .mockReturnValue(mockDependencyService as never);

    itemCommand = new ItemCommand();
  });

  afterEach(() => {
    mockReadFile.mockRestore();
  });

  describe('add', () => {
    it('should submit the file content and print the pull request', async () => {
      await itemCommand.executeAdd('x.json', { user: 'bob', type: 'product', file: './x.json' });

      expect(mockReadFile).toHaveBeenCalledWith('./x.json');
      expect(mockService.addItem).toHaveBeenCalledWith({
        user: 'bob',
        itemType: 'product',
        filename: 'x.json',
        content: Buffer.from('{}'),
        isDataOwner: false,
      });
      expect(mockDependencyService.setLogLevel).toHaveBeenCalledWith('warn');
      expect(mockConsoleLog.mock.calls.map(call => call[0])).toEqual([
        '✅ Submitted: Add bob/x.json',
        '   Branch:       add-bob-x-json',
        '   Pull request: #7 https://github.com/test-org/catalog/pull/7',
      ]);
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('should output JSON when --json is provided', async () => {
      await itemCommand.executeAdd('x.json', { user: 'bob', type: 'product', file: './x.json', json: true });

      expect(mockDependencyService.setLogLevel).toHaveBeenCalledWith('silent');
      const output = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
      expect(output).toEqual({
        success: true,
        data: {
          filename: 'bob/x.json',
          itemType: 'product',
          changeKind: 'Add',
          user: 'bob',
          isDataOwner: false,
          branch: 'add-bob-x-json',
          pullRequest: { number: 7, url: 'https://github.com/test-org/catalog/pull/7' },
        },
      });
    });

    it('should print nothing with --quiet', async () => {
      await itemCommand.executeAdd('x.json', { user: 'bob', type: 'product', file: './x.json', quiet: true });

      expect(mockConsoleLog).not.toHaveBeenCalled();
    });

    it('should fail without calling the service when the file cannot be read', async () => {
      mockReadFile.mockRejectedValue(new Error("ENOENT: no such file or directory, open './x.json'"));

      await itemCommand.executeAdd('x.json', { user: 'bob', type: 'product', file: './x.json' });

      expect(mockService.addItem).not.toHaveBeenCalled();
      expect(mockConsoleError).toHaveBeenCalledWith(
        "❌ Item add failed: ENOENT: no such file or directory, open './x.json'",
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should report service errors and exit 1', async () => {
      mockService.addItem.mockRejectedValue(new Error('Invalid user: ".." must be a single path segment'));

      await itemCommand.executeAdd('x.json', { user: '..', type: 'product', file: './x.json' });

      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ Item add failed: Invalid user: ".." must be a single path segment',
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should print technical details with --verbose', async () => {
      mockService.addItem.mockRejectedValue(new Error('boom'));

      await itemCommand.executeAdd('x.json', { user: 'bob', type: 'product', file: './x.json', verbose: true });

      expect(mockDependencyService.setLogLevel).toHaveBeenCalledWith('debug');
      expect(mockConsoleError).toHaveBeenCalledTimes(2);
      expect(String(mockConsoleError.mock.calls[1]?.[0])).toMatch(/^🔍 Technical details: Error: boom/);
    });
  });

  describe('update', () => {
    it('should submit through updateItem', async () => {
      await itemCommand.executeUpdate('x.json', { user: 'bob', type: 'product', file: './x.json', dataOwner: true });

      expect(mockService.updateItem).toHaveBeenCalledWith(expect.objectContaining({
        filename: 'x.json',
        isDataOwner: true,
      }));
      expect(mockService.addItem).not.toHaveBeenCalled();
      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Submitted: Update bob/x.json');
    });
  });

  describe('delete', () => {
    it('should submit a deletion without reading a file', async () => {
      await itemCommand.executeDelete('x.json', { user: 'bob', type: 'product', dataOwner: true });

      expect(mockReadFile).not.toHaveBeenCalled();
      expect(mockService.deleteItem).toHaveBeenCalledWith({
        user: 'bob',
        itemType: 'product',
        filename: 'x.json',
        isDataOwner: true,
      });
      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Submitted: Delete bob/x.json');
    });

    it('should output a JSON error envelope', async () => {
      mockService.deleteItem.mockRejectedValue(new Error('Conflict: deleteFile b:bob/x.json'));

      await itemCommand.executeDelete('x.json', { user: 'bob', type: 'product', json: true });

      const output = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
      expect(output).toEqual({
        success: false,
        error: 'Item delete failed: Conflict: deleteFile b:bob/x.json',
        exitCode: 1,
      });
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });
  });

  describe('register', () => {
    it('should route parsed arguments to the handlers', async () => {
      const program = new Command();
      const executeAdd = jest.spyOn(itemCommand, 'executeAdd').mockResolvedValue(undefined);
      const executeDelete = jest.spyOn(itemCommand, 'executeDelete').mockResolvedValue(undefined);
      itemCommand.register(program);

      await program.parseAsync(['item', 'add', 'x.json', '-u', 'bob', '-t', 'product', '-f', './x.json', '--data-owner'], { from: 'user' });
      await program.parseAsync(['item', 'rm', 'x.json', '--user', 'bob', '--type', 'product'], { from: 'user' });

      expect(executeAdd).toHaveBeenCalledWith('x.json', expect.objectContaining({
        user: 'bob',
        type: 'product',
        file: './x.json',
        dataOwner: true,
      }));
      expect(executeDelete).toHaveBeenCalledWith('x.json', expect.objectContaining({ user: 'bob', type: 'product' }));
    });
  });
});
