// Mock EndpointFactory before importing
jest.mock('../../services/endpoint-factory', () => ({
  EndpointFactory: {
    getInstance: jest.fn()
  }
}));

import { Command } from 'commander';
import { EncryptCommand } from './encrypt-command';
import { EndpointFactory } from '../../services/endpoint-factory';
import { CredentialError } from '@hookline/core';

// Mock console methods to capture output
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

let mockTravis: {
  encrypt: jest.MockedFunction<(owner: string, repo: string, plaintext: string) => Promise<string>>;
};

describe('EncryptCommand', () => {
  let encryptCommand: EncryptCommand;

  beforeEach(() => {
    jest.clearAllMocks();

    mockTravis = {
      encrypt: jest.fn().mockResolvedValue('c2VjcmV0')
    };
    const mockFactory = {
      getTravisEndpoint: jest.fn().mockResolvedValue(mockTravis)
    };
    jest.mocked(EndpointFactory.getInstance).mockReturnValue(mockFactory as never);

    encryptCommand = new EncryptCommand();
  });

  it('should print a secure entry for .travis.yml', async () => {
    const program = new Command();
    encryptCommand.register(program);

    await program.parseAsync(['node', 'hookline', 'encrypt', 'octo-org/web', 'API_KEY=test-secret']);

    expect(mockTravis.encrypt).toHaveBeenCalledWith('octo-org', 'web', 'API_KEY=test-secret');
    expect(mockConsoleLog.mock.calls).toEqual([['secure: "c2VjcmV0"']]);
  });

  it('should return the ciphertext in JSON', async () => {
    await encryptCommand.execute({ slug: 'octo-org/web', value: 'API_KEY=test-secret', json: true });

    expect(mockConsoleLog).toHaveBeenCalledWith(JSON.stringify({
      success: true,
      data: { repository: 'octo-org/web', secure: 'c2VjcmV0' }
    }, null, 2));
  });

  it('should show technical details in verbose mode', async () => {
    mockTravis.encrypt.mockRejectedValue(
      new CredentialError('TravisEndpoint needs a token or a GitHub token to log in')
    );

    await encryptCommand.execute({ slug: 'octo-org/web', value: 'API_KEY=test-secret', verbose: true });

    expect(mockConsoleError).toHaveBeenNthCalledWith(1, '❌ TravisEndpoint needs a token or a GitHub token to log in');
    expect(mockConsoleError).toHaveBeenNthCalledWith(2, expect.stringContaining('🔍 Technical details: '));
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});
