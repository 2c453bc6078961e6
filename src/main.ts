import 'dotenv/config';
import { createInterface, Interface } from 'readline';
import { v4 as uuidv4 } from 'uuid';
import { createSupportRuntime } from './bootstrap';
import { loadEnvironment } from './config/environment';
import { ChatMessage } from './types/common';
import { logger } from './utils/logger';

const EXIT_COMMANDS = ['quit', 'exit', 'q'];

function ask(rl: Interface, prompt: string): Promise<string> {
  return new Promise<string>((resolve) => {
    rl.question(prompt, (input) => {
      resolve(input.trim());
    });
  });
}

async function startConversation() {
  try {
    const config = loadEnvironment();
    logger.setLevel(config.logLevel);

    const runtime = await createSupportRuntime(config);
    const summary = await runtime.knowledgeBase.initialize();
    const stats = await runtime.knowledgeBase.getStats();
    const databaseUp = await runtime.store.ping();

    const rl = createInterface({
      input: process.stdin,
      output: process.stdout
    });

    const sessionId = uuidv4();
    let history: ChatMessage[] = [];

    logger.info('Customer support CLI started', {
      sessionId,
      operation: 'application_start'
    });

    console.log('🎧 Customer Support Agent');
    console.log('='.repeat(50));
    console.log(`📚 Knowledge base: ${stats.documentCount} chunks from ${stats.sourceCount} documents` +
      (summary.processed > 0 ? ` (${summary.processed} newly indexed)` : ''));
    console.log(`🗄️  Database: ${databaseUp ? 'connected' : 'unavailable'}`);
    console.log('Type "quit", "exit" or "q" to end our conversation');
    console.log('='.repeat(50));

    while (true) {
      const userInput = await ask(rl, '\n👤 You: ');
      if (!userInput) {
        continue;
      }

      if (EXIT_COMMANDS.includes(userInput.toLowerCase())) {
        console.log('\n👋 Thank you for contacting support. Goodbye!');
        break;
      }

      try {
        let result = await runtime.conversation.processTurn({ sessionId, userInput, history });

        while (result.pendingApprovals.length > 0) {
          console.log(`\n🤖 Agent: ${result.response}`);
          const answer = await ask(rl, '👤 You (yes/no): ');
          result = await runtime.conversation.processTurn({
            sessionId,
            userInput: answer,
            history: result.history
          });
        }

        history = result.history;
        console.log(`\n🤖 Agent: ${result.response}`);
      } catch (error) {
        console.error('\n❌ I encountered an error processing your request.');
        console.log('🔄 Please try rephrasing your question.');

        logger.error('Query processing failed', error as Error, {
          sessionId,
          operation: 'query_processing'
        });
      }
    }

    rl.close();
    await runtime.close();
  } catch (error) {
    console.error('💥 Failed to start Customer Support Agent:', (error as Error).message);

    if ((error as Error).message.includes('OPENAI_API_KEY')) {
      console.error('');
      console.error('🔑 Please ensure your OpenAI API key is set:');
      console.error('   1. Copy .env.example to .env');
      console.error('   2. Add your OpenAI API key to the .env file');
      console.error('   3. Restart the application');
      console.error('');
    }

    process.exit(1);
  }
}

// Handle graceful shutdown
process.on('SIGINT', () => {
  logger.info('Received SIGINT, shutting down gracefully');
  console.log('\n👋 Goodbye!');
  process.exit(0);
});

startConversation().catch(console.error);
