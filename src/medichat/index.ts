import dotenv from 'dotenv';
import { createApp } from './app';
import { configWarnings, loadConfig } from './config';
import { GeminiClient } from './tools/gemini-client';
import { ChatWorkflow } from './workflows/chat-workflow';

// Load environment variables first
dotenv.config();

function startServer(): void {
  try {
    const config = loadConfig();
    for (const warning of configWarnings(config)) {
      console.warn(`⚠️  ${warning}`);
    }

    const gemini = new GeminiClient(config.gemini);
    const chatWorkflow = new ChatWorkflow({ gateway: gemini });
    const app = createApp({ config, chatWorkflow });

    const server = app.listen(config.port, () => {
      console.log('🚀 Server started successfully!');
      console.log(`📡 Server running on http://localhost:${config.port}`);
      console.log(`💬 Chat UI: http://localhost:${config.port}/chat`);
      console.log('📱 Environment:', config.environment);
    });

    process.on('SIGTERM', () => {
      console.log('🛑 SIGTERM received, shutting down gracefully');
      server.close(() => {
        console.log('✅ Process terminated');
      });
    });
  } catch (error) {
    console.error('💥 Failed to start server:', error);
    process.exit(1);
  }
}

startServer();
