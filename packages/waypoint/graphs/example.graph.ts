/**
 * Example graph: a small settings app.
 *
 * Help opens from Home and from Settings and returns with its back button to
 * whichever one it came from. The menu closes itself once an entry is picked,
 * so nothing ever returns to it.
 */

import { defineGraph } from '../src/definition/index.ts';

export default defineGraph({
  name: 'example-settings',
  description: 'Home, a menu, settings, about and a shared help screen',
  initialScene: 'Home',
  entry: '/',

  build(graph, ui) {
    const back = ui.element('[data-testid="back"]', 'back button');

    graph.createScene('Home', (scene) => {
      scene.tap(ui.element('[data-testid="menu"]', 'menu button'), 'Menu');
      scene.tap(ui.element('[data-testid="help"]', 'help link'), 'Help');
    });

    graph.createScene('Menu', (scene) => {
      scene.dismissOnUse = true;
      scene.tap(ui.element('text=Settings'), 'Settings');
      scene.tap(ui.element('text=Close'), 'Home');
    });

    graph.createScene('Settings', (scene) => {
      scene.existsWhen = ui.element('h1:has-text("Settings")', 'settings title');
      scene.tap(ui.element('text=About'), 'About');
      scene.tap(ui.element('[data-testid="help"]', 'help link'), 'Help');
      scene.tap(ui.element('[data-testid="home"]', 'home button'), 'Home');
      scene.typeText('dark', ui.element('#theme-search', 'theme search'), 'ThemeResults');
    });

    graph.createScene('ThemeResults', (scene) => {
      scene.backAction = () => back.tap();
    });

    graph.createScene('About', (scene) => {
      scene.swipeDown(ui.element('[data-testid="about-sheet"]', 'about sheet'), 'Settings');
    });

    graph.createScene('Help', (scene) => {
      scene.backAction = () => back.tap();
    });
  },
});
